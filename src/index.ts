export type { CommandOutput } from "./cli/RunNetbenchCLI.ts";
export {
  compareCommand,
  latencyCommand,
  runCli,
  sequenceCommand,
  simulateCommand,
} from "./cli/RunNetbenchCLI.ts";
export type { DualPathComparison } from "./DualPathComparator.ts";
export {
  compareDualPath,
  improvementPercent,
  selectedPath,
} from "./DualPathComparator.ts";
export {
  InsufficientDataError,
  InvalidParameterError,
  LengthMismatchError,
  MalformedRecordError,
  NetbenchError,
  ToolOutputError,
} from "./Errors.ts";
export {
  backToBackJson,
  burstJson,
  dualPathJson,
  exportResultsJson,
  frameLossJson,
  prepareJsonData,
  sequenceJson,
  statsJson,
  throughputJson,
} from "./export/JsonExport.ts";
export * from "./export/JsonFormat.ts";
export type {
  BackToBackRecord,
  ThroughputProbeRecord,
} from "./parse/Iperf3Output.ts";
export {
  backToBackRecord,
  parseIperf3Json,
  throughputProbeResult,
} from "./parse/Iperf3Output.ts";
export { parsePingLatencies, parsePingLoss } from "./parse/PingOutput.ts";
export type { Probe, ProbeResult } from "./Probe.ts";
export { effectiveLoss, failedProbe, runProbe } from "./Probe.ts";
export type { NamedResult, ResultsMapper } from "./report/ResultsReport.ts";
export { reportResults } from "./report/ResultsReport.ts";
export {
  burstSection,
  frameLossSection,
  jitterSection,
  latencySection,
  latencySections,
  reportDualPath,
  sequenceSection,
  tailSection,
  throughputSection,
} from "./report/StandardSections.ts";
export type { ColumnGroup } from "./report/TableReport.ts";
export { buildTable } from "./report/TableReport.ts";
export type {
  BurstOptions,
  BurstResult,
  BurstStep,
} from "./search/BurstCapacity.ts";
export { findMaxBurstNoLoss } from "./search/BurstCapacity.ts";
export type {
  FrameLossOptions,
  FrameLossResult,
  FrameLossTrial,
} from "./search/FrameLossSweep.ts";
export { measureFrameLoss } from "./search/FrameLossSweep.ts";
export type {
  RateSearchOptions,
  RateSearchResult,
  RateSearchStep,
  SearchState,
  SearchStatus,
} from "./search/RateSearch.ts";
export { findMaxZeroLossRate } from "./search/RateSearch.ts";
export type {
  FrameSequenceRecord,
  RTag,
  SequenceAnalysis,
} from "./sequence/SequenceAnalyzer.ts";
export {
  analyzeSequence,
  decodeRTag,
  recordsFromPayloads,
  sequenceRecords,
} from "./sequence/SequenceAnalyzer.ts";
export type {
  PathModel,
  SimulatedPaths,
  SimulationOptions,
} from "./simulate/PathSimulator.ts";
export {
  seededRandom,
  simulatePathLatencies,
} from "./simulate/PathSimulator.ts";
export type { PercentileStats } from "./StatisticalUtils.ts";
export {
  average,
  computePercentileStats,
  median,
  percentile,
  standardDeviation,
} from "./StatisticalUtils.ts";

import { basename } from "node:path";
import pico from "picocolors";
import yargs from "yargs";
import { compareDualPath } from "../DualPathComparator.ts";
import { InsufficientDataError, type MalformedRecordError } from "../Errors.ts";
import {
  dualPathJson,
  exportResultsJson,
  sequenceJson,
  statsJson,
} from "../export/JsonExport.ts";
import type { ResultsJson } from "../export/JsonFormat.ts";
import { signedPercent } from "../report/Formatters.ts";
import { reportResults } from "../report/ResultsReport.ts";
import {
  latencySections,
  reportDualPath,
  sequenceSection,
} from "../report/StandardSections.ts";
import { analyzeSequence } from "../sequence/SequenceAnalyzer.ts";
import { simulatePathLatencies } from "../simulate/PathSimulator.ts";
import {
  computePercentileStats,
  type PercentileStats,
} from "../StatisticalUtils.ts";
import {
  type CommonArgs,
  defaultCliArgs,
  sequenceOptions,
  simulateOptions,
} from "./CliArgs.ts";
import { loadLatencySamples, loadSequenceRecords } from "./InputFiles.ts";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { yellow, dim } = isTest
  ? { yellow: (s: string) => s, dim: (s: string) => s }
  : pico;

/** Printable report and exportable results of one command */
export interface CommandOutput {
  report: string;
  results: ResultsJson;
}

export interface SequenceCommandOptions {
  streamId?: number;
  onMalformed?: (error: MalformedRecordError) => void;
}

/** Parse arguments and run the selected command */
export async function runCli(argv: string[]): Promise<void> {
  await defaultCliArgs(yargs(argv))
    .command(
      "latency <files..>",
      "latency statistics for each sample file (JSON array or ping output)",
      y =>
        y.positional("files", {
          type: "string",
          array: true,
          demandOption: true,
        }),
      async args => emit(await latencyCommand(args.files), "latency", args),
    )
    .command(
      "compare <path1> <path2>",
      "compare two redundant paths against first-arrival selection",
      y =>
        y
          .positional("path1", { type: "string", demandOption: true })
          .positional("path2", { type: "string", demandOption: true }),
      async args => {
        const output = await compareCommand(args.path1, args.path2);
        await emit(output, "compare", args);
      },
    )
    .command(
      "sequence <file>",
      "duplicate and ordering analysis of a replicated frame stream",
      y =>
        y
          .positional("file", { type: "string", demandOption: true })
          .options(sequenceOptions),
      async args => {
        const onMalformed = args.quiet ? undefined : warnMalformed;
        const options = { streamId: args.streamId, onMalformed };
        await emit(await sequenceCommand(args.file, options), "sequence", args);
      },
    )
    .command(
      "simulate",
      "simulate two redundant paths and compare them",
      y => y.options(simulateOptions),
      async args => {
        const seed = args.seed ?? randomSeed();
        const output = simulateCommand(args.samples, seed);
        await emit(output, "simulate", { ...args, seed });
      },
    )
    .fail(false)
    .parseAsync();
}

/** @return latency table, one row per sample file */
export async function latencyCommand(files: string[]): Promise<CommandOutput> {
  const named: { name: string; result: PercentileStats }[] = [];
  for (const file of files) {
    named.push({ name: basename(file), result: await fileStats(file) });
  }
  const latency = Object.fromEntries(
    named.map(({ name, result }) => [name, statsJson(result)]),
  );
  return {
    report: reportResults(named, latencySections),
    results: { latency },
  };
}

/** @return dual-path comparison of two sample files */
export async function compareCommand(
  path1File: string,
  path2File: string,
): Promise<CommandOutput> {
  const path1 = await loadLatencySamples(path1File);
  const path2 = await loadLatencySamples(path2File);
  return dualPathOutput(path1, path2);
}

/** @return sequence analysis of a frame record or capture file */
export async function sequenceCommand(
  file: string,
  options: SequenceCommandOptions = {},
): Promise<CommandOutput> {
  let skipped = 0;
  const onMalformed = (error: MalformedRecordError) => {
    skipped++;
    options.onMalformed?.(error);
  };
  const { streamId } = options;
  const records = await loadSequenceRecords(file, { streamId, onMalformed });
  const analysis = {
    ...analyzeSequence(records, { onMalformed }),
    malformed: skipped,
  };

  const table = reportResults(
    [{ name: basename(file), result: analysis }],
    [sequenceSection],
  );
  const note = skipped
    ? `\n${dim(`${skipped} malformed records skipped`)}`
    : "";
  return {
    report: table + note,
    results: { sequence: sequenceJson(analysis) },
  };
}

/** @return dual-path comparison over simulated latencies */
export function simulateCommand(samples: number, seed: number): CommandOutput {
  const { path1, path2 } = simulatePathLatencies({ samples, seed });
  const output = dualPathOutput(path1, path2);
  const header = `Simulated ${samples} samples per path (seed ${seed})`;
  return { ...output, report: `${header}\n\n${output.report}` };
}

function dualPathOutput(path1: number[], path2: number[]): CommandOutput {
  const comparison = compareDualPath(path1, path2);
  const { improvement_avg_pct, improvement_p99_pct, improvement_jitter_pct } =
    comparison;
  const summary = [
    `Average latency improvement: ${signedPercent(improvement_avg_pct)}`,
    `P99 latency improvement:     ${signedPercent(improvement_p99_pct)}`,
    `Jitter reduction:            ${signedPercent(improvement_jitter_pct)}`,
  ];
  return {
    report: [reportDualPath(comparison), ...summary].join("\n"),
    results: { dual_path: dualPathJson(comparison) },
  };
}

async function fileStats(file: string): Promise<PercentileStats> {
  const samples = await loadLatencySamples(file);
  if (samples.length === 0) {
    throw new InsufficientDataError(`${file}: no latency samples found`);
  }
  return computePercentileStats(samples);
}

async function emit(
  output: CommandOutput,
  command: string,
  args: CommonArgs & Record<string, unknown>,
): Promise<void> {
  console.log(output.report);
  if (args.json) {
    await exportResultsJson(output.results, args.json, command, args);
  }
}

function warnMalformed(error: MalformedRecordError): void {
  console.warn(yellow(`Skipped: ${error.message}`));
}

function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 32);
}

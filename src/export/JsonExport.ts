import { writeFile } from "node:fs/promises";
import type { DualPathComparison } from "../DualPathComparator.ts";
import type { BackToBackRecord } from "../parse/Iperf3Output.ts";
import type { BurstResult } from "../search/BurstCapacity.ts";
import type { FrameLossResult } from "../search/FrameLossSweep.ts";
import type { RateSearchResult } from "../search/RateSearch.ts";
import type { SequenceAnalysis } from "../sequence/SequenceAnalyzer.ts";
import type { PercentileStats } from "../StatisticalUtils.ts";
import type {
  BackToBackJson,
  BurstJson,
  DualPathJson,
  FrameLossJson,
  NetbenchJsonData,
  ResultsJson,
  SequenceJson,
  StatsJson,
  ThroughputJson,
} from "./JsonFormat.ts";

/** Export results to JSON file */
export async function exportResultsJson(
  results: ResultsJson,
  outputPath: string,
  command: string,
  args: Record<string, unknown>,
): Promise<void> {
  const jsonData = prepareJsonData(results, command, args);
  const jsonString = JSON.stringify(jsonData, null, 2);

  await writeFile(outputPath, jsonString, "utf-8");
  console.log(`Results exported to: ${outputPath}`);
}

/** @return export document with run metadata */
export function prepareJsonData(
  results: ResultsJson,
  command: string,
  args: Record<string, unknown>,
): NetbenchJsonData {
  return {
    meta: {
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || "unknown",
      command,
      args: cleanCliArgs(args),
      environment: {
        node: process.version,
        platform: process.platform,
        arch: process.arch,
      },
    },
    results,
  };
}

/** @return latency stats keyed as downstream report tools expect */
export function statsJson(stats: PercentileStats): StatsJson {
  const { p99_9, ...rest } = stats;
  return { ...rest, "p99.9": p99_9 };
}

export function dualPathJson(c: DualPathComparison): DualPathJson {
  return {
    path1: statsJson(c.path1_stats),
    path2: statsJson(c.path2_stats),
    selected: statsJson(c.selected_stats),
    improvements: {
      avg_percent: c.improvement_avg_pct,
      p99_percent: c.improvement_p99_pct,
      jitter_percent: c.improvement_jitter_pct,
    },
  };
}

export function sequenceJson(a: SequenceAnalysis): SequenceJson {
  return {
    total_packets: a.total,
    unique_packets: a.unique,
    duplicates: a.duplicates,
    out_of_order: a.out_of_order,
    replication_ratio: a.replication_ratio_pct,
    elimination_efficiency: a.elimination_efficiency_pct,
    malformed: a.malformed,
  };
}

export function burstJson(b: BurstResult): BurstJson {
  return {
    frame_size: b.frame_size,
    max_burst_no_loss: b.max_burst_no_loss,
    trials: [...b.trial_values],
    avg_burst: b.avg_burst,
    stddev_burst: b.stddev_burst,
    exhausted: b.exhausted,
  };
}

export function backToBackJson(r: BackToBackRecord): BackToBackJson {
  return { ...r };
}

export function throughputJson(r: RateSearchResult): ThroughputJson {
  const { best_rate, iterations, status, passed } = r;
  return { best_rate, iterations, status, passed };
}

export function frameLossJson(r: FrameLossResult): FrameLossJson {
  return { ...r, trials: [...r.trials] };
}

/** Clean CLI args for JSON export (drop yargs internals and undefined values) */
function cleanCliArgs(args: Record<string, unknown>): Record<string, unknown> {
  const toCamel = (k: string) =>
    k.replace(/-([a-z])/g, (_, l: string) => l.toUpperCase());
  const entries = Object.entries(args)
    .filter(([k, v]) => v != null && k !== "_" && k !== "$0")
    .map(([k, v]) => [toCamel(k), v]);
  return Object.fromEntries(entries);
}

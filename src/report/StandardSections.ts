import {
  type DualPathComparison,
  improvementPercent,
} from "../DualPathComparator.ts";
import type { BurstResult } from "../search/BurstCapacity.ts";
import type { FrameLossResult } from "../search/FrameLossSweep.ts";
import type { RateSearchResult } from "../search/RateSearch.ts";
import type { SequenceAnalysis } from "../sequence/SequenceAnalyzer.ts";
import type { PercentileStats } from "../StatisticalUtils.ts";
import {
  integer,
  lossPercent,
  mbps,
  percent,
  signedPercent,
  timeMs,
} from "./Formatters.ts";
import type { ResultsMapper } from "./ResultsReport.ts";
import { buildTable, type ColumnGroup } from "./TableReport.ts";

export type LatencyStats = {
  min: number;
  avg: number;
  median: number;
  max: number;
};

/** Section: min, mean, median, max latency */
export const latencySection: ResultsMapper<PercentileStats, LatencyStats> = {
  extract: ({ min, avg, median, max }) => ({ min, avg, median, max }),
  columns: () => [
    {
      groupTitle: "latency",
      columns: [
        { key: "min", title: "min", formatter: timeMs },
        { key: "avg", title: "avg", formatter: timeMs },
        { key: "median", title: "median", formatter: timeMs },
        { key: "max", title: "max", formatter: timeMs },
      ],
    },
  ],
};

export type TailStats = {
  p90: number;
  p95: number;
  p99: number;
  p99_9: number;
};

/** Section: tail percentiles */
export const tailSection: ResultsMapper<PercentileStats, TailStats> = {
  extract: ({ p90, p95, p99, p99_9 }) => ({ p90, p95, p99, p99_9 }),
  columns: () => [
    {
      groupTitle: "percentiles",
      columns: [
        { key: "p90", title: "p90", formatter: timeMs },
        { key: "p95", title: "p95", formatter: timeMs },
        { key: "p99", title: "p99", formatter: timeMs },
        { key: "p99_9", title: "p99.9", formatter: timeMs },
      ],
    },
  ],
};

export type JitterStats = { jitter: number; count: number };

/** Section: jitter and sample count */
export const jitterSection: ResultsMapper<PercentileStats, JitterStats> = {
  extract: ({ jitter, count }) => ({ jitter, count }),
  columns: () => [
    {
      columns: [
        { key: "jitter", title: "jitter", formatter: timeMs },
        { key: "count", title: "samples", formatter: integer },
      ],
    },
  ],
};

export const latencySections = [
  latencySection,
  tailSection,
  jitterSection,
] as const;

export type ThroughputStats = {
  best_rate: number;
  iterations: number;
  status: string;
};

/** Section: zero-loss throughput search outcome */
export const throughputSection: ResultsMapper<
  RateSearchResult,
  ThroughputStats
> = {
  extract: ({ best_rate, iterations, status, passed }) => ({
    best_rate,
    iterations,
    status: passed ? status : "no passing rate",
  }),
  columns: () => [
    {
      groupTitle: "zero-loss throughput",
      columns: [
        { key: "best_rate", title: "rate", formatter: mbps },
        { key: "iterations", title: "iterations", formatter: integer },
        { key: "status", title: "status" },
      ],
    },
  ],
};

export type BurstStats = {
  max_burst_no_loss: number;
  avg_burst: number;
  stddev_burst: number;
  trials: number;
};

/** Section: back-to-back burst capacity */
export const burstSection: ResultsMapper<BurstResult, BurstStats> = {
  extract: r => ({
    max_burst_no_loss: r.max_burst_no_loss,
    avg_burst: r.avg_burst,
    stddev_burst: r.stddev_burst,
    trials: r.trial_values.length,
  }),
  columns: () => [
    {
      groupTitle: "burst (frames)",
      columns: [
        { key: "max_burst_no_loss", title: "max", formatter: integer },
        { key: "avg_burst", title: "avg", formatter: integer },
        { key: "stddev_burst", title: "stddev", formatter: integer },
        { key: "trials", title: "trials", formatter: integer },
      ],
    },
  ],
};

export type FrameLossStats = {
  target_rate: number;
  avg_loss_percent?: number;
  min_loss_percent?: number;
  max_loss_percent?: number;
  failed_trials: number;
};

/** Section: loss at one offered load */
export const frameLossSection: ResultsMapper<FrameLossResult, FrameLossStats> =
  {
    extract: r => ({
      target_rate: r.target_rate,
      avg_loss_percent: r.avg_loss_percent,
      min_loss_percent: r.min_loss_percent,
      max_loss_percent: r.max_loss_percent,
      failed_trials: r.failed_trials,
    }),
    columns: () => [
      {
        columns: [{ key: "target_rate", title: "target", formatter: mbps }],
      },
      {
        groupTitle: "loss",
        columns: [
          { key: "avg_loss_percent", title: "avg", formatter: lossPercent },
          { key: "min_loss_percent", title: "min", formatter: lossPercent },
          { key: "max_loss_percent", title: "max", formatter: lossPercent },
          { key: "failed_trials", title: "failed", formatter: integer },
        ],
      },
    ],
  };

export type SequenceStats = {
  total: number;
  unique: number;
  duplicates: number;
  out_of_order: number;
  replication_ratio_pct: number;
  elimination_efficiency_pct: number;
};

/** Section: duplicate elimination and ordering */
export const sequenceSection: ResultsMapper<SequenceAnalysis, SequenceStats> = {
  extract: r => ({
    total: r.total,
    unique: r.unique,
    duplicates: r.duplicates,
    out_of_order: r.out_of_order,
    replication_ratio_pct: r.replication_ratio_pct,
    elimination_efficiency_pct: r.elimination_efficiency_pct,
  }),
  columns: () => [
    {
      groupTitle: "frames",
      columns: [
        { key: "total", title: "total", formatter: integer },
        { key: "unique", title: "unique", formatter: integer },
        { key: "duplicates", title: "dup", formatter: integer },
        { key: "out_of_order", title: "reordered", formatter: integer },
      ],
    },
    {
      groupTitle: "ratios",
      columns: [
        {
          key: "replication_ratio_pct",
          title: "replication",
          formatter: percent,
        },
        {
          key: "elimination_efficiency_pct",
          title: "elimination",
          formatter: percent,
        },
      ],
    },
  ],
};

type DualPathRow = {
  metric: string;
  path1: number;
  path2: number;
  selected: number;
  improvement?: number;
};

// biome-ignore format: one row per metric
const dualPathMetrics: [string, keyof PercentileStats][] = [
  ["min", "min"], ["avg", "avg"], ["max", "max"],
  ["p50", "p50"], ["p90", "p90"], ["p95", "p95"],
  ["p99", "p99"], ["p99.9", "p99_9"], ["jitter", "jitter"],
];

const dualPathColumns: ColumnGroup<DualPathRow>[] = [
  { columns: [{ key: "metric", title: "metric" }] },
  {
    groupTitle: "latency",
    columns: [
      { key: "path1", title: "path 1", formatter: timeMs },
      { key: "path2", title: "path 2", formatter: timeMs },
      { key: "selected", title: "selected", formatter: timeMs },
    ],
  },
  {
    columns: [
      { key: "improvement", title: "vs path 1", formatter: signedPercent },
    ],
  },
];

/** @return metric-per-row table comparing both paths with selection */
export function reportDualPath(comparison: DualPathComparison): string {
  const { path1_stats, path2_stats, selected_stats } = comparison;
  const rows = dualPathMetrics.map(([metric, key]) => {
    const path1 = path1_stats[key];
    const selected = selected_stats[key];
    const improvement =
      path1 > 0 ? improvementPercent(path1, selected) : undefined;
    return { metric, path1, path2: path2_stats[key], selected, improvement };
  });
  return buildTable(dualPathColumns, rows);
}

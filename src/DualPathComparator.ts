import { LengthMismatchError } from "./Errors.ts";
import {
  computePercentileStats,
  type PercentileStats,
} from "./StatisticalUtils.ts";

/** Latency of two redundant paths and of first-arrival selection */
export interface DualPathComparison {
  readonly path1_stats: PercentileStats;
  readonly path2_stats: PercentileStats;
  readonly selected_stats: PercentileStats;
  /** Improvements of the selected series relative to path 1, percent */
  readonly improvement_avg_pct: number;
  readonly improvement_p99_pct: number;
  readonly improvement_jitter_pct: number;
}

/**
 * Compare two paths against forwarding whichever copy arrives first.
 *
 * Samples are paired by index: path1[i] and path2[i] are the two copies of
 * the same frame.
 */
export function compareDualPath(
  path1: readonly number[],
  path2: readonly number[],
): DualPathComparison {
  if (path1.length !== path2.length) {
    throw new LengthMismatchError(path1.length, path2.length);
  }
  const path1_stats = computePercentileStats(path1);
  const path2_stats = computePercentileStats(path2);
  const selected_stats = computePercentileStats(selectedPath(path1, path2));

  const improvement = (key: "avg" | "p99" | "jitter") =>
    improvementPercent(path1_stats[key], selected_stats[key]);

  return {
    path1_stats,
    path2_stats,
    selected_stats,
    improvement_avg_pct: improvement("avg"),
    improvement_p99_pct: improvement("p99"),
    improvement_jitter_pct: improvement("jitter"),
  };
}

/** @return per-sample minimum of the two paths */
export function selectedPath(
  path1: readonly number[],
  path2: readonly number[],
): number[] {
  if (path1.length !== path2.length) {
    throw new LengthMismatchError(path1.length, path2.length);
  }
  return path1.map((latency, i) => Math.min(latency, path2[i]));
}

/** @return reduction from base to value, percent of base (0 if base is 0) */
export function improvementPercent(base: number, value: number): number {
  if (base === 0) return 0;
  return ((base - value) / base) * 100;
}

import { InsufficientDataError } from "./Errors.ts";

/** Descriptive latency statistics, all values in milliseconds */
export interface PercentileStats {
  readonly count: number;
  readonly min: number;
  readonly max: number;
  readonly avg: number;
  readonly median: number;
  readonly stddev: number;
  readonly p50: number;
  readonly p90: number;
  readonly p95: number;
  readonly p99: number;
  readonly p99_9: number;
  /** Sample standard deviation, always equal to stddev */
  readonly jitter: number;
}

/** @return mean of values */
export function average(values: readonly number[]): number {
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/** @return standard deviation with Bessel's correction */
export function standardDeviation(samples: readonly number[]): number {
  if (samples.length <= 1) return 0;
  const mean = average(samples);
  const variance =
    samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / (samples.length - 1);
  return Math.sqrt(variance);
}

/**
 * @return value at percentile p (0-100), linearly interpolated between
 * the two closest ranks of the sorted values
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    throw new InsufficientDataError("Cannot take a percentile of no samples");
  }
  return sortedPercentile(sortAscending(values), p);
}

/** @return median of values */
export function median(values: readonly number[]): number {
  return percentile(values, 50);
}

/** @return latency statistics for a non-empty sample set */
export function computePercentileStats(
  samples: readonly number[],
): PercentileStats {
  if (samples.length === 0) {
    throw new InsufficientDataError("No latency samples to analyze");
  }
  if (!samples.every(Number.isFinite)) {
    throw new InsufficientDataError("Latency samples must be finite numbers");
  }

  const sorted = sortAscending(samples);
  const at = (p: number) => sortedPercentile(sorted, p);
  const stddev = standardDeviation(samples);
  const p50 = at(50);

  return {
    count: samples.length,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: average(samples),
    median: p50,
    stddev,
    p50,
    p90: at(90),
    p95: at(95),
    p99: at(99),
    p99_9: at(99.9),
    jitter: stddev,
  };
}

/** @return percentile from already sorted values */
function sortedPercentile(sorted: readonly number[], p: number): number {
  if (!(p >= 0 && p <= 100)) {
    throw new RangeError(`Percentile must be within [0, 100], got ${p}`);
  }
  const index = ((sorted.length - 1) * p) / 100;
  const floor = Math.floor(index);
  const ceil = floor + 1;
  if (ceil >= sorted.length) return sorted[floor];

  const frac = index - floor;
  return sorted[floor] * (1 - frac) + sorted[ceil] * frac;
}

function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

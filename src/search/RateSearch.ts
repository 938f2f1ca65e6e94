import { InvalidParameterError } from "../Errors.ts";
import { effectiveLoss, type Probe, runProbe } from "../Probe.ts";
import { validateLossThreshold } from "./SearchUtils.ts";

// defaults match a 1 Gbps link searched to 1% resolution
const defaultLow = 1;
const defaultHigh = 1000;
const defaultTolerance = 0.01;
const defaultLossThreshold = 0.001; // percent
const defaultMaxIterations = 20;

export interface RateSearchOptions {
  /** Lower bound of the offered rate (e.g. Mbps) */
  low?: number;
  /** Upper bound of the offered rate */
  high?: number;
  /** Stop once (high - low) / high drops below this */
  tolerance?: number;
  /** Loss percent strictly below this passes */
  lossThreshold?: number;
  maxIterations?: number;
  /** Called after each probe, for progress logging */
  onStep?: (step: RateSearchStep) => void;
}

/** Bisection window of one search run */
export interface SearchState {
  readonly low: number;
  readonly high: number;
  readonly tolerance: number;
  readonly iterations: number;
  readonly max_iterations: number;
  /** Highest rate observed passing, undefined until one passes */
  readonly best_known?: number;
}

export type SearchStatus = "searching" | "converged" | "exhausted";

/** Progress report for one bisection step */
export interface RateSearchStep {
  iteration: number;
  rate: number;
  /** Loss the search acted on (100 for a failed probe) */
  loss_percent: number;
  success: boolean;
  accepted: boolean;
  /** Window after this step */
  low: number;
  high: number;
}

export interface RateSearchResult {
  /** Highest passing rate observed, 0 if none passed */
  readonly best_rate: number;
  readonly iterations: number;
  readonly status: Exclude<SearchStatus, "searching">;
  /** false if no probe passed */
  readonly passed: boolean;
}

/**
 * Find the maximum offered rate with loss below the threshold.
 *
 * Probes run strictly one after another, each bisection step narrowing the
 * window left by the previous one. A failed probe only lowers the upper
 * bound, so the reported rate is always one that was observed passing.
 */
export async function findMaxZeroLossRate(
  probe: Probe,
  options: RateSearchOptions = {},
): Promise<RateSearchResult> {
  const { lossThreshold = defaultLossThreshold, onStep } = options;
  let state = initialSearchState(options);
  validateLossThreshold(lossThreshold);

  for (;;) {
    const status = searchStatus(state);
    if (status !== "searching") return searchResult(state, status);

    const rate = (state.low + state.high) / 2;
    const result = await runProbe(probe, rate);
    const loss = effectiveLoss(result);
    const accepted = result.success && loss < lossThreshold;
    state = narrowWindow(state, rate, accepted);

    const { iterations: iteration, low, high } = state;
    onStep?.({
      iteration,
      rate,
      loss_percent: loss,
      success: result.success,
      accepted,
      low,
      high,
    });
  }
}

/** @return validated starting window */
export function initialSearchState(options: RateSearchOptions): SearchState {
  const {
    low = defaultLow,
    high = defaultHigh,
    tolerance = defaultTolerance,
    maxIterations = defaultMaxIterations,
  } = options;

  if (!Number.isFinite(low) || !Number.isFinite(high) || low < 0) {
    throw new InvalidParameterError(
      `Search bounds must be finite and non-negative, got [${low}, ${high}]`,
    );
  }
  if (high <= low) {
    throw new InvalidParameterError(
      `Search upper bound ${high} must exceed lower bound ${low}`,
    );
  }
  if (!(tolerance > 0) || !Number.isFinite(tolerance)) {
    throw new InvalidParameterError(
      `Tolerance must be positive, got ${tolerance}`,
    );
  }
  if (!Number.isInteger(maxIterations) || maxIterations < 0) {
    throw new InvalidParameterError(
      `maxIterations must be a non-negative integer, got ${maxIterations}`,
    );
  }

  return {
    low,
    high,
    tolerance,
    iterations: 0,
    max_iterations: maxIterations,
  };
}

/** @return whether the search continues, converged, or ran out of budget */
export function searchStatus(state: SearchState): SearchStatus {
  const { low, high, tolerance, iterations, max_iterations } = state;
  if ((high - low) / high < tolerance) return "converged";
  if (iterations >= max_iterations) return "exhausted";
  return "searching";
}

/** @return window after probing rate: raise low on a pass, else lower high */
export function narrowWindow(
  state: SearchState,
  rate: number,
  accepted: boolean,
): SearchState {
  const iterations = state.iterations + 1;
  if (accepted) {
    return { ...state, iterations, low: rate, best_known: rate };
  }
  return { ...state, iterations, high: rate };
}

function searchResult(
  state: SearchState,
  status: RateSearchResult["status"],
): RateSearchResult {
  const { best_known, iterations } = state;
  return {
    best_rate: best_known ?? 0,
    iterations,
    status,
    passed: best_known !== undefined,
  };
}

import { InvalidParameterError } from "../Errors.ts";
import { effectiveLoss, type Probe, runProbe } from "../Probe.ts";
import { average, standardDeviation } from "../StatisticalUtils.ts";
import {
  serialMap,
  validateLossThreshold,
  validateTrials,
} from "./SearchUtils.ts";

const defaultLossThreshold = 1; // percent
const defaultFrameSize = 64;

export interface BurstOptions {
  /** Loss percent at or above this ends a trial's scan */
  lossThreshold?: number;
  trials?: number;
  /** Frame size in bytes, reported in the result */
  frameSize?: number;
  /** Run independent trials in parallel rather than one after another */
  concurrent?: boolean;
  /** Called after each probe, for progress logging */
  onStep?: (step: BurstStep) => void;
}

/** Progress report for one probed burst size */
export interface BurstStep {
  trial: number;
  burst_size: number;
  loss_percent: number;
  success: boolean;
  passed: boolean;
}

/** Back-to-back capacity aggregated across trials */
export interface BurstResult {
  readonly frame_size: number;
  /** Worst trial's capacity, the claim that held every time */
  readonly max_burst_no_loss: number;
  readonly trial_values: readonly number[];
  readonly avg_burst: number;
  readonly stddev_burst: number;
  /** true if some trial passed every candidate, so capacity may be higher */
  readonly exhausted: boolean;
}

interface TrialOutcome {
  maxBurst: number;
  passedAll: boolean;
}

/**
 * Find the largest burst absorbed without loss.
 *
 * Each trial scans the candidate sizes upward and stops at the first size
 * whose loss reaches the threshold. The reported capacity is the minimum
 * over trials.
 */
export async function findMaxBurstNoLoss(
  candidateSizes: readonly number[],
  probe: Probe,
  options: BurstOptions = {},
): Promise<BurstResult> {
  const {
    lossThreshold = defaultLossThreshold,
    trials = 1,
    frameSize = defaultFrameSize,
    concurrent = false,
    onStep,
  } = options;
  validateCandidates(candidateSizes);
  validateTrials(trials);
  validateLossThreshold(lossThreshold);

  const scan = (trial: number) =>
    scanTrial(trial, candidateSizes, probe, lossThreshold, onStep);
  const trialNumbers = Array.from({ length: trials }, (_, i) => i + 1);
  const outcomes = concurrent
    ? await Promise.all(trialNumbers.map(scan))
    : await serialMap(trialNumbers, scan);

  const trial_values = outcomes.map(o => o.maxBurst);
  return {
    frame_size: frameSize,
    max_burst_no_loss: Math.min(...trial_values),
    trial_values,
    avg_burst: average(trial_values),
    stddev_burst: standardDeviation(trial_values),
    exhausted: outcomes.some(o => o.passedAll),
  };
}

/** @return largest passing size before the first lossy candidate */
async function scanTrial(
  trial: number,
  candidateSizes: readonly number[],
  probe: Probe,
  lossThreshold: number,
  onStep?: (step: BurstStep) => void,
): Promise<TrialOutcome> {
  let maxBurst = 0;
  for (const size of candidateSizes) {
    const result = await runProbe(probe, size);
    const loss = effectiveLoss(result);
    const passed = loss < lossThreshold;
    onStep?.({
      trial,
      burst_size: size,
      loss_percent: loss,
      success: result.success,
      passed,
    });
    if (!passed) return { maxBurst, passedAll: false };
    maxBurst = size;
  }
  return { maxBurst, passedAll: candidateSizes.length > 0 };
}

function validateCandidates(sizes: readonly number[]): void {
  sizes.forEach((size, i) => {
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidParameterError(
        `Burst sizes must be positive integers, got ${size}`,
      );
    }
    if (i > 0 && size <= sizes[i - 1]) {
      throw new InvalidParameterError(
        `Burst sizes must be strictly ascending: ${sizes[i - 1]} then ${size}`,
      );
    }
  });
}

import { InvalidParameterError } from "../Errors.ts";
import { type Probe, runProbe } from "../Probe.ts";
import { average } from "../StatisticalUtils.ts";
import { serialMap, validateTrials } from "./SearchUtils.ts";

const defaultLineRate = 1000; // Mbps

export interface FrameLossOptions {
  /** Rate at 100% offered load */
  lineRate?: number;
  /** Trials per offered load */
  trials?: number;
  onTrial?: (trial: FrameLossTrial) => void;
}

/** Progress report for one trial */
export interface FrameLossTrial {
  offered_load_pct: number;
  target_rate: number;
  trial: number;
  success: boolean;
  loss_percent: number;
}

/** Loss measured at one offered load */
export interface FrameLossResult {
  readonly offered_load_pct: number;
  readonly target_rate: number;
  /** loss_percent of each successful trial, in trial order */
  readonly trials: readonly number[];
  readonly failed_trials: number;
  readonly avg_loss_percent?: number;
  readonly min_loss_percent?: number;
  readonly max_loss_percent?: number;
}

/**
 * Measure frame loss at each offered load.
 *
 * Unlike the searches, a failed trial here carries no loss figure:
 * it is counted in failed_trials and left out of the averages. A trial
 * reporting a non-finite loss counts as failed.
 */
export async function measureFrameLoss(
  offeredLoads: readonly number[],
  probe: Probe,
  options: FrameLossOptions = {},
): Promise<FrameLossResult[]> {
  const { lineRate = defaultLineRate, trials = 1, onTrial } = options;
  validateTrials(trials);
  if (!(lineRate > 0) || !Number.isFinite(lineRate)) {
    throw new InvalidParameterError(`Line rate must be positive: ${lineRate}`);
  }
  for (const load of offeredLoads) {
    if (!(load > 0) || !Number.isFinite(load)) {
      throw new InvalidParameterError(`Offered load must be positive: ${load}`);
    }
  }

  return serialMap(offeredLoads, async load => {
    const target_rate = (lineRate * load) / 100;
    const losses: number[] = [];
    let failed = 0;
    for (let trial = 1; trial <= trials; trial++) {
      const result = await runProbe(probe, target_rate);
      const { loss_percent } = result;
      const success = result.success && Number.isFinite(loss_percent);
      if (success) losses.push(loss_percent);
      else failed++;
      onTrial?.({
        offered_load_pct: load,
        target_rate,
        trial,
        success,
        loss_percent,
      });
    }
    return lossSummary(load, target_rate, losses, failed);
  });
}

function lossSummary(
  offered_load_pct: number,
  target_rate: number,
  trials: number[],
  failed_trials: number,
): FrameLossResult {
  const base = { offered_load_pct, target_rate, trials, failed_trials };
  if (trials.length === 0) return base;
  return {
    ...base,
    avg_loss_percent: average(trials),
    min_loss_percent: Math.min(...trials),
    max_loss_percent: Math.max(...trials),
  };
}

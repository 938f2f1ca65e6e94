/** Outcome of one measurement trial at a candidate rate or burst size */
export interface ProbeResult {
  readonly success: boolean;
  /** Frame loss in percent (0-100) */
  readonly loss_percent: number;
  /** Value actually achieved by the tool, e.g. measured Mbps */
  readonly actual_value: number;
  /** Reason a failed probe produced no data */
  readonly error?: string;
}

/**
 * Measurement capability injected into the search engines.
 *
 * Implementations run an external tool (iperf3, ping, a packet blaster)
 * at the given parameter and report what happened. Timeouts and retries
 * belong to the implementation: signal them by returning
 * `success: false` or by throwing.
 */
export type Probe<P = number> = (
  parameter: P,
) => ProbeResult | Promise<ProbeResult>;

/** @return a failed probe result, counted as total loss */
export function failedProbe(error: string): ProbeResult {
  return { success: false, loss_percent: 100, actual_value: 0, error };
}

/** @return probe result, with thrown errors converted to failures */
export async function runProbe<P>(
  probe: Probe<P>,
  parameter: P,
): Promise<ProbeResult> {
  try {
    return await probe(parameter);
  } catch (e) {
    return failedProbe(e instanceof Error ? e.message : String(e));
  }
}

/** @return loss percent to act on: failures count as 100% loss */
export function effectiveLoss(result: ProbeResult): number {
  if (!result.success || !Number.isFinite(result.loss_percent)) return 100;
  return result.loss_percent;
}

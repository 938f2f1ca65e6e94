import { z } from "zod";
import { ToolOutputError } from "../Errors.ts";
import type { ProbeResult } from "../Probe.ts";

/** Throughput trial as reported by iperf3 in UDP mode */
export interface ThroughputProbeRecord {
  readonly target_bandwidth_mbps: number;
  readonly actual_bandwidth_mbps: number;
  readonly packets_sent: number;
  readonly packets_lost: number;
  readonly loss_percent: number;
  readonly jitter_ms: number;
}

/** Back-to-back trial: one iperf3 run at line rate */
export interface BackToBackRecord {
  readonly frame_size: number;
  readonly frames_sent: number;
  readonly frames_received: number;
  readonly frames_lost: number;
  readonly loss_percent: number;
  /** Frames delivered in the burst */
  readonly max_burst_size: number;
}

const count = z.number().nonnegative().default(0);

/** The `end.sum` totals of `iperf3 -u -J`; absent counters read as zero */
const Iperf3Report = z.object({
  error: z.string().optional(),
  end: z
    .object({
      sum: z.object({
        bits_per_second: count,
        packets: count,
        lost_packets: count,
        lost_percent: count,
        jitter_ms: count,
      }),
    })
    .optional(),
});

/** @return throughput record from iperf3 JSON output */
export function parseIperf3Json(
  output: string,
  targetMbps: number,
): ThroughputProbeRecord {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ToolOutputError(`iperf3 output is not JSON: ${reason}`);
  }

  const parsed = Iperf3Report.safeParse(json);
  if (!parsed.success) {
    throw new ToolOutputError(`Invalid iperf3 report: ${parsed.error.message}`);
  }
  const { error, end } = parsed.data;
  if (error) throw new ToolOutputError(`iperf3 failed: ${error}`);
  if (!end) throw new ToolOutputError("iperf3 report has no end summary");

  const { sum } = end;
  return {
    target_bandwidth_mbps: targetMbps,
    actual_bandwidth_mbps: sum.bits_per_second / 1e6,
    packets_sent: sum.packets,
    packets_lost: sum.lost_packets,
    loss_percent: sum.lost_percent,
    jitter_ms: sum.jitter_ms,
  };
}

/** @return probe result for a search engine from a parsed iperf3 trial */
export function throughputProbeResult(
  record: ThroughputProbeRecord,
): ProbeResult {
  return {
    success: true,
    loss_percent: record.loss_percent,
    actual_value: record.actual_bandwidth_mbps,
  };
}

/** @return frame counts of a back-to-back trial from its iperf3 record */
export function backToBackRecord(
  record: ThroughputProbeRecord,
  frameSize: number,
): BackToBackRecord {
  const { packets_sent: frames_sent, packets_lost: frames_lost } = record;
  const frames_received = Math.max(0, frames_sent - frames_lost);
  return {
    frame_size: frameSize,
    frames_sent,
    frames_received,
    frames_lost,
    loss_percent: record.loss_percent,
    max_burst_size: frames_received,
  };
}

import { readFileSync } from "node:fs";
import { expect, test } from "vitest";
import { ToolOutputError } from "../Errors.ts";
import {
  backToBackRecord,
  parseIperf3Json,
  throughputProbeResult,
} from "../parse/Iperf3Output.ts";
import { parsePingLatencies, parsePingLoss } from "../parse/PingOutput.ts";

const pingOutput = readFileSync(
  new URL("./fixtures/ping.txt", import.meta.url),
  "utf-8",
);

const iperf3Output = JSON.stringify({
  start: { test_start: { protocol: "UDP" } },
  end: {
    sum: {
      bits_per_second: 99_500_000,
      packets: 8000,
      lost_packets: 4,
      lost_percent: 0.05,
      jitter_ms: 0.012,
    },
  },
});

test("reads round-trip times from ping replies", () => {
  expect(parsePingLatencies(pingOutput)).toEqual([0.412, 0.398, 0.405]);
});

test("reads sub-millisecond and integer reply formats", () => {
  const output = [
    "Reply from 192.0.2.1: bytes=32 time<1ms TTL=128",
    "Reply from 192.0.2.1: bytes=32 time=12ms TTL=128",
    "64 bytes from 192.0.2.1: icmp_seq=1 ttl=64 time=.25 ms",
  ].join("\n");
  expect(parsePingLatencies(output)).toEqual([1, 12, 0.25]);
});

test("ping summary lines are not replies", () => {
  const summary =
    "3 packets transmitted, 3 received, 0% packet loss, time 2003ms";
  expect(parsePingLatencies(summary)).toEqual([]);
});

test("reads ping loss summary", () => {
  expect(parsePingLoss(pingOutput)).toBe(25);
  expect(parsePingLoss("2 packets transmitted, 0.5% packet loss")).toBe(0.5);
  expect(parsePingLoss("no summary here")).toBeUndefined();
});

test("reads iperf3 UDP totals", () => {
  const record = parseIperf3Json(iperf3Output, 100);
  expect(record).toEqual({
    target_bandwidth_mbps: 100,
    actual_bandwidth_mbps: 99.5,
    packets_sent: 8000,
    packets_lost: 4,
    loss_percent: 0.05,
    jitter_ms: 0.012,
  });
  expect(throughputProbeResult(record)).toEqual({
    success: true,
    loss_percent: 0.05,
    actual_value: 99.5,
  });
});

test("back-to-back trial counts received frames as the burst size", () => {
  const record = parseIperf3Json(iperf3Output, 1000);
  expect(backToBackRecord(record, 64)).toEqual({
    frame_size: 64,
    frames_sent: 8000,
    frames_received: 7996,
    frames_lost: 4,
    loss_percent: 0.05,
    max_burst_size: 7996,
  });
});

test("missing iperf3 counters read as zero", () => {
  const output = JSON.stringify({ end: { sum: { bits_per_second: 1e6 } } });
  expect(parseIperf3Json(output, 1)).toEqual({
    target_bandwidth_mbps: 1,
    actual_bandwidth_mbps: 1,
    packets_sent: 0,
    packets_lost: 0,
    loss_percent: 0,
    jitter_ms: 0,
  });
});

test("rejects unusable iperf3 output", () => {
  const cases: [string, string][] = [
    ["not json", "iperf3 output is not JSON"],
    [
      JSON.stringify({ error: "unable to connect" }),
      "iperf3 failed: unable to connect",
    ],
    [JSON.stringify({ start: {} }), "iperf3 report has no end summary"],
    [
      JSON.stringify({ end: { sum: { packets: -1 } } }),
      "Invalid iperf3 report",
    ],
  ];
  for (const [output, message] of cases) {
    expect(() => parseIperf3Json(output, 100)).toThrow(ToolOutputError);
    expect(() => parseIperf3Json(output, 100)).toThrow(message);
  }
});

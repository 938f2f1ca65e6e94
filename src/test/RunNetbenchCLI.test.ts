import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, expect, test, vi } from "vitest";
import {
  compareCommand,
  latencyCommand,
  runCli,
  sequenceCommand,
  simulateCommand,
} from "../cli/RunNetbenchCLI.ts";
import { InsufficientDataError } from "../Errors.ts";
import type { NetbenchJsonData } from "../export/JsonFormat.ts";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

afterEach(() => {
  vi.restoreAllMocks();
});

test("latency command summarizes each file", async () => {
  const files = [fixture("latency-path1.json"), fixture("ping.txt")];
  const { report, results } = await latencyCommand(files);

  expect(Object.keys(results.latency ?? {})).toEqual([
    "latency-path1.json",
    "ping.txt",
  ]);
  expect(results.latency?.["latency-path1.json"].avg).toBeCloseTo(8 / 3, 10);
  expect(results.latency?.["ping.txt"].count).toBe(3);
  expect(results.latency?.["ping.txt"].min).toBe(0.398);
  expect(report).toContain("ping.txt");
  expect(report).toContain("0.412ms");
});

test("latency command rejects files without samples", async () => {
  await expect(latencyCommand([fixture("empty-ping.txt")])).rejects.toThrow(
    InsufficientDataError,
  );
});

test("compare command reads array and object sample files", async () => {
  const { report, results } = await compareCommand(
    fixture("latency-path1.json"),
    fixture("latency-path2.json"),
  );
  expect(results.dual_path?.path2.avg).toBe(3);
  expect(results.dual_path?.improvements.avg_percent).toBeCloseTo(25, 10);
  expect(report).toContain("Average latency improvement: +25.0%");
  expect(report).toContain("Jitter reduction:            +34.5%");
});

test("sequence command counts unreadable entries as malformed", async () => {
  const skipped: number[] = [];
  const { report, results } = await sequenceCommand(fixture("sequence.json"), {
    onMalformed: e => skipped.push(e.index),
  });

  expect(results.sequence).toMatchObject({
    total_packets: 7,
    unique_packets: 5,
    duplicates: 2,
    out_of_order: 1,
    malformed: 1,
  });
  expect(skipped).toEqual([6]);
  expect(report).toContain("1 malformed records skipped");
});

test("sequence command decodes a hex capture", async () => {
  const skipped: string[] = [];
  const { results } = await sequenceCommand(fixture("capture.hex"), {
    onMalformed: e => skipped.push(e.message),
  });

  expect(results.sequence).toMatchObject({
    total_packets: 4,
    unique_packets: 3,
    duplicates: 1,
    out_of_order: 1,
    malformed: 4,
  });
  expect(skipped).toEqual([
    "Malformed record at 3: not hex-encoded bytes",
    "Malformed record at 4: EtherType 0x0800 is not R-TAG",
    "Malformed record at 6: not hex-encoded bytes",
    "Malformed record at 7: not hex-encoded bytes",
  ]);
});

test("sequence command filters a capture by stream", async () => {
  const { report, results } = await sequenceCommand(fixture("capture.hex"), {
    streamId: 1,
  });
  expect(results.sequence).toMatchObject({
    total_packets: 3,
    unique_packets: 2,
    duplicates: 1,
    out_of_order: 0,
    malformed: 4,
  });
  expect(report).toContain("4 malformed records skipped");
});

test("simulate command repeats for a fixed seed", () => {
  const first = simulateCommand(200, 7);
  const second = simulateCommand(200, 7);
  expect(second.results).toEqual(first.results);
  expect(first.report).toContain("Simulated 200 samples per path (seed 7)");
  expect(first.results.dual_path?.path1.count).toBe(200);
});

test("cli prints the latency report", async () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  await runCli(["latency", fixture("latency-path1.json")]);
  expect(log).toHaveBeenCalledTimes(1);
  expect(String(log.mock.calls[0][0])).toContain("latency-path1.json");
});

test("cli warns about malformed records unless quiet", async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  await runCli(["sequence", fixture("sequence.json")]);
  expect(warn).toHaveBeenCalledTimes(1);
  expect(warn).toHaveBeenCalledWith(
    "Skipped: Malformed record at 6: sequence number NaN is not a uint32",
  );

  warn.mockClear();
  await runCli(["sequence", fixture("sequence.json"), "--quiet"]);
  expect(warn).not.toHaveBeenCalled();
});

test("cli exports simulation results with the seed", async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  const dir = await mkdtemp(join(tmpdir(), "netbench-cli-"));
  const path = join(dir, "simulate.json");
  try {
    const argv = ["simulate", "--samples", "50", "--seed", "3"];
    await runCli([...argv, "--json", path]);
    const data: NetbenchJsonData = JSON.parse(await readFile(path, "utf-8"));
    expect(data.meta.command).toBe("simulate");
    expect(data.meta.args).toMatchObject({ samples: 50, seed: 3, json: path });
    expect(data.results.dual_path?.path1.count).toBe(50);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("cli rejects a missing input file", async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  await expect(
    runCli(["latency", fixture("no-such-file.json")]),
  ).rejects.toThrow();
});

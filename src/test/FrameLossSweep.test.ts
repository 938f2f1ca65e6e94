import { expect, test } from "vitest";
import { InvalidParameterError } from "../Errors.ts";
import type { ProbeResult } from "../Probe.ts";
import {
  type FrameLossTrial,
  measureFrameLoss,
} from "../search/FrameLossSweep.ts";

test("measures loss at each offered load", async () => {
  let fullRateCalls = 0;
  const probe = (rate: number): ProbeResult => {
    if (rate < 1000) {
      return { success: true, loss_percent: 0, actual_value: rate };
    }
    fullRateCalls++;
    return fullRateCalls === 1
      ? { success: true, loss_percent: 2, actual_value: rate }
      : { success: false, loss_percent: 0, actual_value: 0, error: "timeout" };
  };
  const results = await measureFrameLoss([50, 100], probe, { trials: 2 });

  expect(results).toEqual([
    {
      offered_load_pct: 50,
      target_rate: 500,
      trials: [0, 0],
      failed_trials: 0,
      avg_loss_percent: 0,
      min_loss_percent: 0,
      max_loss_percent: 0,
    },
    {
      offered_load_pct: 100,
      target_rate: 1000,
      trials: [2],
      failed_trials: 1,
      avg_loss_percent: 2,
      min_loss_percent: 2,
      max_loss_percent: 2,
    },
  ]);
});

test("scales target rate by line rate", async () => {
  const rates: number[] = [];
  const probe = (rate: number): ProbeResult => {
    rates.push(rate);
    return { success: true, loss_percent: rate / 100, actual_value: rate };
  };
  const results = await measureFrameLoss([10, 80], probe, { lineRate: 10000 });
  expect(rates).toEqual([1000, 8000]);
  expect(results.map(r => r.avg_loss_percent)).toEqual([10, 80]);
});

test("omits loss figures when every trial fails", async () => {
  const probe = () => {
    throw new Error("tool missing");
  };
  const trials: FrameLossTrial[] = [];
  const [result] = await measureFrameLoss([100], probe, {
    trials: 3,
    onTrial: t => trials.push(t),
  });

  expect(result).toEqual({
    offered_load_pct: 100,
    target_rate: 1000,
    trials: [],
    failed_trials: 3,
  });
  expect(trials.map(t => t.trial)).toEqual([1, 2, 3]);
  expect(trials.every(t => !t.success)).toBe(true);
});

test("non-finite loss counts as a failed trial", async () => {
  const losses = [Number.NaN, 0.5, Number.POSITIVE_INFINITY];
  const probe = (rate: number): ProbeResult => ({
    success: true,
    loss_percent: losses.shift() ?? 0,
    actual_value: rate,
  });
  const trials: FrameLossTrial[] = [];
  const [result] = await measureFrameLoss([50], probe, {
    trials: 3,
    onTrial: t => trials.push(t),
  });

  expect(result).toEqual({
    offered_load_pct: 50,
    target_rate: 500,
    trials: [0.5],
    failed_trials: 2,
    avg_loss_percent: 0.5,
    min_loss_percent: 0.5,
    max_loss_percent: 0.5,
  });
  expect(trials.map(t => t.success)).toEqual([false, true, false]);
});

test("averages successful trials", async () => {
  const losses = [0.1, 0.3, 0.2];
  const probe = (rate: number): ProbeResult => ({
    success: true,
    loss_percent: losses.shift() ?? 0,
    actual_value: rate,
  });
  const [result] = await measureFrameLoss([90], probe, { trials: 3 });
  expect(result.avg_loss_percent).toBeCloseTo(0.2, 10);
  expect(result.min_loss_percent).toBe(0.1);
  expect(result.max_loss_percent).toBe(0.3);
});

test("rejects unusable sweep options", async () => {
  const probe = (): ProbeResult => ({
    success: true,
    loss_percent: 0,
    actual_value: 0,
  });
  await expect(measureFrameLoss([0], probe)).rejects.toThrow(
    InvalidParameterError,
  );
  await expect(measureFrameLoss([50], probe, { lineRate: -1 })).rejects.toThrow(
    InvalidParameterError,
  );
  await expect(measureFrameLoss([50], probe, { trials: 0 })).rejects.toThrow(
    InvalidParameterError,
  );
});

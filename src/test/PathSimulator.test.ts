import { expect, test } from "vitest";
import { compareDualPath } from "../DualPathComparator.ts";
import { InvalidParameterError } from "../Errors.ts";
import {
  seededRandom,
  simulatePathLatencies,
} from "../simulate/PathSimulator.ts";
import { average } from "../StatisticalUtils.ts";

test("same seed gives the same latencies", () => {
  const first = simulatePathLatencies({ samples: 100, seed: 7 });
  const second = simulatePathLatencies({ samples: 100, seed: 7 });
  const other = simulatePathLatencies({ samples: 100, seed: 8 });
  expect(second).toEqual(first);
  expect(other.path1).not.toEqual(first.path1);
});

test("generates one sample per path per draw, clamped to the floor", () => {
  const { path1, path2 } = simulatePathLatencies({
    samples: 500,
    seed: 1,
    floor: 0.2,
  });
  expect(path1).toHaveLength(500);
  expect(path2).toHaveLength(500);
  expect(Math.min(...path1, ...path2)).toBeGreaterThanOrEqual(0.2);
});

test("sample means follow the path models", () => {
  const { path1, path2 } = simulatePathLatencies({ samples: 5000, seed: 11 });
  expect(average(path1)).toBeGreaterThan(0.39);
  expect(average(path1)).toBeLessThan(0.42);
  expect(average(path2)).toBeGreaterThan(0.44);
  expect(average(path2)).toBeLessThan(0.47);
});

test("custom path models", () => {
  const { path1, path2 } = simulatePathLatencies({
    samples: 10,
    seed: 3,
    path1: { mean: 5, stddev: 0 },
    path2: { mean: 2, stddev: 0 },
    floor: 0,
  });
  expect(path1).toEqual(Array(10).fill(5));
  expect(path2).toEqual(Array(10).fill(2));
});

test("selection over simulated paths lowers average latency", () => {
  const { path1, path2 } = simulatePathLatencies({ samples: 1000, seed: 5 });
  const comparison = compareDualPath(path1, path2);
  expect(comparison.improvement_avg_pct).toBeGreaterThan(0);
});

test("seeded generator stays within [0, 1)", () => {
  const random = seededRandom(123);
  for (let i = 0; i < 1000; i++) {
    const value = random();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  }
});

test("rejects negative sample counts", () => {
  expect(simulatePathLatencies({ samples: 0 })).toEqual({
    path1: [],
    path2: [],
  });
  expect(() => simulatePathLatencies({ samples: -1 })).toThrow(
    InvalidParameterError,
  );
});

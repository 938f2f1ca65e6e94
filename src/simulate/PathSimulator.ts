import { InvalidParameterError } from "../Errors.ts";

/** Gaussian latency model for one path, in milliseconds */
export interface PathModel {
  mean: number;
  stddev: number;
}

export interface SimulationOptions {
  samples?: number;
  path1?: PathModel;
  path2?: PathModel;
  /** Latencies below this are clamped up to it */
  floor?: number;
  /** Fixes the generator so repeated runs give the same latencies */
  seed?: number;
}

export interface SimulatedPaths {
  path1: number[];
  path2: number[];
}

/** Primary path: faster on average, more jitter */
export const defaultPath1: PathModel = { mean: 0.4, stddev: 0.15 };
/** Secondary path: slower, steadier */
export const defaultPath2: PathModel = { mean: 0.45, stddev: 0.12 };
const defaultFloor = 0.15;
const defaultSamples = 1000;

/** @return latency samples for two independent paths */
export function simulatePathLatencies(
  options: SimulationOptions = {},
): SimulatedPaths {
  const {
    samples = defaultSamples,
    path1 = defaultPath1,
    path2 = defaultPath2,
    floor = defaultFloor,
    seed,
  } = options;
  if (!Number.isInteger(samples) || samples < 0) {
    throw new InvalidParameterError(
      `samples must be a non-negative integer, got ${samples}`,
    );
  }

  const random = seed === undefined ? Math.random : seededRandom(seed);
  const gauss = gaussian(random);
  const draw = ({ mean, stddev }: PathModel) =>
    Math.max(floor, mean + stddev * gauss());

  const result: SimulatedPaths = { path1: [], path2: [] };
  for (let i = 0; i < samples; i++) {
    result.path1.push(draw(path1));
    result.path2.push(draw(path2));
  }
  return result;
}

/** @return mulberry32 generator of uniform values in [0, 1) */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** @return standard normal generator (Box-Muller) over a uniform source */
function gaussian(random: () => number): () => number {
  return () => {
    const u1 = 1 - random(); // (0, 1], keeps log finite
    const u2 = random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

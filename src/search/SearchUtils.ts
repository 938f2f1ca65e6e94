import { InvalidParameterError } from "../Errors.ts";

/** Sequential map over async function */
export async function serialMap<T, R>(
  arr: readonly T[],
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  for (const item of arr) {
    results.push(await fn(item));
  }
  return results;
}

/** Throw unless lossThreshold is a usable loss percentage */
export function validateLossThreshold(lossThreshold: number): void {
  if (!Number.isFinite(lossThreshold) || lossThreshold < 0) {
    throw new InvalidParameterError(
      `Loss threshold must be a non-negative percentage, got ${lossThreshold}`,
    );
  }
}

/** Throw unless trials is a positive integer */
export function validateTrials(trials: number): void {
  if (!Number.isInteger(trials) || trials < 1) {
    throw new InvalidParameterError(
      `trials must be a positive integer, got ${trials}`,
    );
  }
}

import { assertPeriod } from "../errors.js";
import { emaRecursion } from "./rolling.js";

/**
 * Exponential Moving Average, seeded with the first value (not an SMA seed).
 * Returns an array of the same length as input. First `period - 1` values are NaN.
 */
export function ema(values: readonly number[], period: number): number[] {
  assertPeriod(period, "EMA period");
  return emaRecursion(values, period);
}

import { assertPeriod } from "../errors.js";

/**
 * Simple Moving Average: plain trailing sum divided by `window`.
 * Returns an array of the same length as input; first `window - 1` values are NaN.
 *
 * Not NaN-aware: the running sum carries a NaN input forward, so every value
 * from the first NaN on is NaN. Use `rollingMean` for the NaN-aware version.
 */
export function sma(values: readonly number[], window: number): number[] {
  assertPeriod(window, "SMA window");

  const result = new Array<number>(values.length).fill(NaN);
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) {
      sum -= values[i - window];
    }
    if (i + 1 >= window) {
      result[i] = sum / window;
    }
  }
  return result;
}

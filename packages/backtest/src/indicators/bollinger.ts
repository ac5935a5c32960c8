import { assertPeriod } from "../errors.js";
import { sma } from "./sma.js";
import { rollingStdDev } from "./rolling.js";

export interface BollingerResult {
  upper: number[];
  middle: number[];
  lower: number[];
}

/**
 * Bollinger Bands: SMA middle band, +/- k sample standard deviations.
 */
export function bollinger(values: readonly number[], period: number, k: number): BollingerResult {
  assertPeriod(period, "Bollinger period");

  const middle = sma(values, period);
  const sd = rollingStdDev(values, period);

  return {
    upper: middle.map((m, i) => m + k * sd[i]),
    middle,
    lower: middle.map((m, i) => m - k * sd[i]),
  };
}

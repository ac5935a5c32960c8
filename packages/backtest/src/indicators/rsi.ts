import { assertPeriod } from "../errors.js";
import { rollingMean } from "./rolling.js";

/**
 * Relative Strength Index with simple (not Wilder) averaging of gains and losses.
 * Returns array of same length as input. First `period` values are NaN, since
 * bar 0 has no delta.
 *
 * avgLoss == 0 gives 100; a NaN delta anywhere in the window gives NaN.
 */
export function rsi(values: readonly number[], period: number): number[] {
  assertPeriod(period, "RSI period");

  const n = values.length;
  const gains = new Array<number>(n).fill(NaN);
  const losses = new Array<number>(n).fill(NaN);
  for (let i = 1; i < n; i++) {
    const delta = values[i] - values[i - 1];
    if (Number.isNaN(delta)) continue;
    gains[i] = delta >= 0 ? delta : 0;
    losses[i] = delta >= 0 ? 0 : -delta;
  }

  const avgGain = rollingMean(gains, period);
  const avgLoss = rollingMean(losses, period);

  return avgGain.map((g, i) => {
    const l = avgLoss[i];
    if (Number.isNaN(g) || Number.isNaN(l)) return NaN;
    if (l === 0) return 100;
    return 100 - 100 / (1 + g / l);
  });
}

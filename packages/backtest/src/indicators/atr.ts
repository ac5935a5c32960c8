import { assertPeriod } from "../errors.js";
import { rollingMean } from "./rolling.js";

/**
 * True Range per bar. Bar 0 is high - low; later bars take the largest of
 * high - low, |high - prevClose| and |low - prevClose|, skipping the two
 * prevClose terms when they are NaN.
 * Length is the shortest of the three inputs.
 */
export function trueRange(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
): number[] {
  const n = Math.min(high.length, low.length, close.length);
  const tr = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    const range = high[i] - low[i];
    if (i === 0) {
      tr[i] = range;
      continue;
    }
    const prevClose = close[i - 1];
    const up = Math.abs(high[i] - prevClose);
    const down = Math.abs(low[i] - prevClose);
    let max = range;
    if (!Number.isNaN(up) && up > max) max = up;
    if (!Number.isNaN(down) && down > max) max = down;
    tr[i] = max;
  }
  return tr;
}

/**
 * Average True Range, simple mean of true range over `period` bars.
 * First `period - 1` values are NaN.
 */
export function atr(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  period: number,
): number[] {
  assertPeriod(period, "ATR period");
  return rollingMean(trueRange(high, low, close), period);
}

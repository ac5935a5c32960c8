import type { Signal } from "../types/trade.js";
import { assertPeriod, InvalidArgumentError } from "../errors.js";
import { sma } from "../indicators/sma.js";

/**
 * Moving-average crossover signals: +1 when the short SMA is above the long
 * SMA, -1 when it is below, each emitted once per regime. Bars where the
 * averages are closer than `minDiff` (or equal), or still warming up, are
 * skipped and leave the regime unchanged.
 */
export function maCrossoverSignals(
  close: readonly number[],
  shortWindow: number,
  longWindow: number,
  minDiff = 0,
): Signal[] {
  assertPeriod(shortWindow, "short window");
  assertPeriod(longWindow, "long window");
  if (shortWindow >= longWindow) {
    throw new InvalidArgumentError(
      `short window (${shortWindow}) must be less than long window (${longWindow})`,
    );
  }
  if (!Number.isFinite(minDiff) || minDiff < 0) {
    throw new InvalidArgumentError(`minDiff must be a non-negative number, got ${minDiff}`);
  }

  const fast = sma(close, shortWindow);
  const slow = sma(close, longWindow);

  let last: Signal = 0;
  return fast.map((f, i): Signal => {
    const s = slow[i];
    if (Number.isNaN(f) || Number.isNaN(s) || Math.abs(f - s) < minDiff) return 0;

    if (f > s && last !== 1) {
      last = 1;
      return 1;
    }
    if (f < s && last !== -1) {
      last = -1;
      return -1;
    }
    return 0;
  });
}

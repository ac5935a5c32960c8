import type { Signal } from "../types/trade.js";
import { bollinger } from "../indicators/bollinger.js";

type Held = "flat" | "long" | "short";

/**
 * Bollinger breakout with a mean-reversion exit.
 *
 * Flat: +1 when the close is above the upper band, -1 when below the lower band.
 * Long: -1 once the close drops below the middle band. Short: +1 once it rises
 * above it. Warm-up bars (NaN bands) never signal.
 */
export function volatilityBreakoutSignals(
  close: readonly number[],
  window: number,
  k: number,
): Signal[] {
  const { upper, middle, lower } = bollinger(close, window, k);

  let held: Held = "flat";
  return close.map((c, i): Signal => {
    if (held === "long") {
      if (c < middle[i]) {
        held = "flat";
        return -1;
      }
    } else if (held === "short") {
      if (c > middle[i]) {
        held = "flat";
        return 1;
      }
    } else if (c > upper[i]) {
      held = "long";
      return 1;
    } else if (c < lower[i]) {
      held = "short";
      return -1;
    }
    return 0;
  });
}

import { formatZodError } from "@tickforge/kit";
import type { BarSeries } from "../types/bar.js";
import type { Direction, EquityPoint, Position, Trade } from "../types/trade.js";
import { InvalidArgumentError, tryResult, type Result } from "../errors.js";
import { logger } from "../lib/logger.js";
import { PositionTracker } from "./position-tracker.js";
import { EquityCurve } from "./equity-curve.js";
import { computeStopLevels, resolveExit } from "./exit-rules.js";
import {
  SimulationOptionsSchema,
  type ResolvedSimulationOptions,
  type SimulationOptions,
} from "./simulation-options.js";

export interface SimulationResult {
  equityCurve: EquityPoint[];
  trades: Trade[];
  finalCash: number;
  /** Position still open after the last bar. It is not force-closed. */
  openPosition: Position | null;
}

function isOpposite(direction: Direction, signal: number): boolean {
  return (direction === "long" && signal === -1) || (direction === "short" && signal === 1);
}

function parseOptions(options: SimulationOptions): ResolvedSimulationOptions {
  const parsed = SimulationOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid simulation options: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

function assertAligned(bars: BarSeries, signals: readonly number[], atr: readonly number[] | null): void {
  const n = bars.timestamps.length;
  const columns: [string, number][] = [
    ["open", bars.open.length],
    ["high", bars.high.length],
    ["low", bars.low.length],
    ["close", bars.close.length],
    ["signals", signals.length],
  ];
  if (atr) columns.push(["atr", atr.length]);

  for (const [name, length] of columns) {
    if (length !== n) {
      throw new InvalidArgumentError(
        `Series length mismatch: ${name} has ${length} values, timestamps has ${n}`,
      );
    }
  }
}

/**
 * Single-pass bar simulator with one-unit positions.
 *
 * Per bar, in order:
 *  1. SL/TP exit check for an open position (SL wins a same-bar tie).
 *  2. Signals: an opposite signal closes at the close ("signal_flip"); a flat
 *     book then opens at the close on buy, or on sell when shorting is allowed.
 *  3. Equity mark at the close.
 *
 * @throws {InvalidArgumentError} on misaligned series or invalid options
 */
export function simulateTrades(
  bars: BarSeries,
  signals: readonly number[],
  options: SimulationOptions,
): SimulationResult {
  const { stops, allowShort, initialCash } = parseOptions(options);
  const atrSeries = stops.mode === "atr" ? stops.atr : null;
  assertAligned(bars, signals, atrSeries);

  const log = logger.createChild("simulate-trades");
  const tracker = new PositionTracker(initialCash);
  const equityCurve = new EquityCurve(initialCash);

  for (let i = 0; i < bars.timestamps.length; i++) {
    const timestamp = bars.timestamps[i];
    const close = bars.close[i];

    // Step 1: intrabar stop-loss / take-profit
    const position = tracker.getPosition();
    if (position) {
      const levels = computeStopLevels(position, stops);
      const exit = resolveExit(position, levels, {
        open: bars.open[i],
        high: bars.high[i],
        low: bars.low[i],
      });
      if (exit) {
        const trade = tracker.closePosition(exit.price, timestamp, i, exit.reason);
        log.debug({ bar: i, ...levels, trade }, "position stopped out");
      }
    }

    // Step 2: signal flip, then entry from flat
    const signal = signals[i];
    const held = tracker.getPosition();
    if (held && isOpposite(held.direction, signal)) {
      const trade = tracker.closePosition(close, timestamp, i, "signal_flip");
      log.debug({ bar: i, trade }, "position flipped");
    }

    if (tracker.isFlat()) {
      const entryAtr = atrSeries ? atrSeries[i] : null;
      if (signal === 1) {
        tracker.openPosition("long", close, timestamp, i, entryAtr);
      } else if (signal === -1 && allowShort) {
        tracker.openPosition("short", close, timestamp, i, entryAtr);
      }
    }

    // Step 3: mark to market, every bar
    equityCurve.mark(timestamp, tracker.getCash() + tracker.unrealizedPnl(close));
  }

  const trades = tracker.getCompletedTrades();
  log.debug(
    {
      bars: bars.timestamps.length,
      trades: trades.length,
      finalCash: tracker.getCash(),
      maxDrawdownPct: equityCurve.getMaxDrawdownPct(),
    },
    "simulation complete",
  );

  return {
    equityCurve: equityCurve.getPoints(),
    trades,
    finalCash: tracker.getCash(),
    openPosition: tracker.getPosition(),
  };
}

/** Like simulateTrades, but returns InvalidArgumentError as a failed Result. */
export function safeSimulateTrades(
  bars: BarSeries,
  signals: readonly number[],
  options: SimulationOptions,
): Result<SimulationResult> {
  return tryResult(() => simulateTrades(bars, signals, options));
}

/**
 * Positional form: `slVal`/`tpVal` are fractions of the entry price in fixed
 * mode and ATR multiples when `useAtr` is set, in which case `atr` is required.
 */
export function simulateTradesFromArrays(
  timestamps: readonly number[],
  open: readonly number[],
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  signals: readonly number[],
  slVal: number,
  tpVal: number,
  allowShort = false,
  useAtr = false,
  atr?: readonly number[],
): SimulationResult {
  if (useAtr && !atr) {
    throw new InvalidArgumentError("ATR stop mode requires an ATR series");
  }
  const bars: BarSeries = { timestamps, open, high, low, close };
  const stops: SimulationOptions["stops"] =
    useAtr && atr
      ? { mode: "atr", slMult: slVal, tpMult: tpVal, atr: [...atr] }
      : { mode: "fixed", slPct: slVal, tpPct: tpVal };
  return simulateTrades(bars, signals, { stops, allowShort });
}

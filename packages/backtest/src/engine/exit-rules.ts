import type { ExitReason, Position } from "../types/trade.js";
import type { StopConfig } from "./simulation-options.js";

export interface StopLevels {
  slPrice: number;
  tpPrice: number | null; // null when take-profit is disabled
}

export interface ExitFill {
  price: number;
  reason: Extract<ExitReason, "sl" | "tp">;
}

export interface BarRange {
  open: number;
  high: number;
  low: number;
}

export function positionSign(position: Position): 1 | -1 {
  return position.direction === "long" ? 1 : -1;
}

/**
 * Stop and target prices for an open position. ATR distances use the ATR
 * captured at entry, never the current bar's.
 */
export function computeStopLevels(position: Position, stops: StopConfig): StopLevels {
  const sign = positionSign(position);
  const entry = position.entryPrice;

  if (stops.mode === "fixed") {
    return {
      slPrice: entry * (1 - sign * stops.slPct),
      tpPrice: stops.tpPct > 0 ? entry * (1 + sign * stops.tpPct) : null,
    };
  }

  const entryAtr = position.entryAtr ?? NaN;
  return {
    slPrice: entry - sign * entryAtr * stops.slMult,
    tpPrice: stops.tpMult > 0 ? entry + sign * entryAtr * stops.tpMult : null,
  };
}

/**
 * Intrabar SL/TP check. The stop is tested first, so a bar that touches both
 * levels exits at the stop. A bar that opens beyond a level fills at the open.
 */
export function resolveExit(position: Position, levels: StopLevels, bar: BarRange): ExitFill | null {
  const { slPrice, tpPrice } = levels;

  if (position.direction === "long") {
    if (bar.low <= slPrice) {
      return { price: bar.open <= slPrice ? bar.open : slPrice, reason: "sl" };
    }
    if (tpPrice !== null && bar.high >= tpPrice) {
      return { price: bar.open >= tpPrice ? bar.open : tpPrice, reason: "tp" };
    }
    return null;
  }

  if (bar.high >= slPrice) {
    return { price: bar.open >= slPrice ? bar.open : slPrice, reason: "sl" };
  }
  if (tpPrice !== null && bar.low <= tpPrice) {
    return { price: bar.open <= tpPrice ? bar.open : tpPrice, reason: "tp" };
  }
  return null;
}

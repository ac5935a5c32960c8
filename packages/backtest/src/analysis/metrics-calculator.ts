import { finiteOr } from "@tickforge/kit";
import type { EquityPoint, ExitReason, Trade } from "../types/trade.js";
import type { Metrics, ExitReasonStats } from "../types/metrics.js";

const MS_PER_DAY = 86_400_000;

function mean(values: number[]): number {
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * sqrt(365 * bars per day), bars per day taken from the median positive gap
 * between timestamps (ms). Falls back to sqrt(365) for daily-or-unknown spacing.
 */
export function annualizationFactor(points: readonly EquityPoint[]): number {
  const deltas: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const dt = points[i].timestamp - points[i - 1].timestamp;
    if (dt > 0) deltas.push(dt);
  }
  if (deltas.length === 0) return Math.sqrt(365);
  return Math.sqrt(365 * (MS_PER_DAY / median(deltas)));
}

function equityMetrics(points: readonly EquityPoint[]): Pick<Metrics, "totalReturn" | "maxDrawdown" | "sharpe"> {
  if (points.length === 0) {
    return { totalReturn: 0, maxDrawdown: 0, sharpe: 0 };
  }

  const initial = points[0].equity;
  const final = points[points.length - 1].equity;
  const totalReturn = initial !== 0 ? final / initial - 1 : 0;

  let peak = initial;
  let maxDd = 0;
  for (const p of points) {
    if (p.equity > peak) peak = p.equity;
    const dd = peak !== 0 ? (p.equity - peak) / peak : 0;
    if (dd < maxDd) maxDd = dd;
  }

  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1].equity;
    if (prev > 0) returns.push(points[i].equity / prev - 1);
  }

  let sharpe = 0;
  if (returns.length > 1) {
    const mu = mean(returns);
    // population standard deviation
    const sigma = Math.sqrt(mean(returns.map((r) => (r - mu) ** 2)));
    sharpe = sigma > 0 ? finiteOr((mu / sigma) * annualizationFactor(points), 0) : 0;
  }

  return { totalReturn: finiteOr(totalReturn, 0), maxDrawdown: Math.abs(maxDd), sharpe };
}

/**
 * Compute aggregate metrics from a simulation's equity curve and trade ledger.
 * Break-even trades are left out of win/loss counts.
 */
export function computeMetrics(equityCurve: readonly EquityPoint[], trades: readonly Trade[]): Metrics {
  const wins = trades.filter((t) => t.pnl > 0).map((t) => t.pnl);
  const losses = trades.filter((t) => t.pnl < 0).map((t) => t.pnl);
  const totalTrades = wins.length + losses.length;

  const grossProfit = wins.reduce((s, v) => s + v, 0);
  const grossLoss = Math.abs(losses.reduce((s, v) => s + v, 0));

  const byExitReason: Record<ExitReason, ExitReasonStats> = {
    sl: { count: 0, pnl: 0 },
    tp: { count: 0, pnl: 0 },
    signal_flip: { count: 0, pnl: 0 },
  };
  for (const t of trades) {
    byExitReason[t.exitReason].count++;
    byExitReason[t.exitReason].pnl += t.pnl;
  }

  return {
    ...equityMetrics(equityCurve),
    totalPnl: trades.reduce((s, t) => s + t.pnl, 0),
    totalTrades,
    winRate: totalTrades > 0 ? wins.length / totalTrades : 0,
    avgWin: wins.length > 0 ? mean(wins) : 0,
    avgLoss: losses.length > 0 ? -mean(losses) : 0,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : null,
    byExitReason,
  };
}

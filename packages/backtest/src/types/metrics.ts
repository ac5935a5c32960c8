import type { ExitReason } from "./trade.js";

export interface ExitReasonStats {
  count: number;
  pnl: number;
}

export interface Metrics {
  // equity curve
  totalReturn: number; // fraction, 0.1 = +10%
  maxDrawdown: number; // positive fraction
  sharpe: number; // annualized from bar-to-bar returns
  // trade ledger
  totalPnl: number;
  totalTrades: number; // trades with non-zero pnl
  winRate: number; // fraction of totalTrades
  avgWin: number;
  avgLoss: number; // positive
  profitFactor: number | null; // null without losing trades
  byExitReason: Record<ExitReason, ExitReasonStats>;
}

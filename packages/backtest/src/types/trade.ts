export type Direction = "long" | "short";

/** 1 = buy, -1 = sell, 0 = none. Any other value is read as none. */
export type Signal = -1 | 0 | 1;

export type ExitReason = "sl" | "tp" | "signal_flip";

export interface Position {
  direction: Direction;
  entryPrice: number;
  entryTimestamp: number;
  entryBarIndex: number;
  entryAtr: number | null; // ATR stop mode only, frozen at entry
}

export interface Trade {
  direction: Direction;
  entryTs: number;
  exitTs: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
  exitReason: ExitReason;
  entryBarIndex: number;
  exitBarIndex: number;
}

export interface EquityPoint {
  timestamp: number;
  equity: number;
  drawdown: number; // 0 to -1 (fraction of running peak)
}

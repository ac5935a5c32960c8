import type { Direction, ExitReason, Position, Trade } from "../types/trade.js";

/**
 * Simulation state for a single run: cash, the open position (if any) and the
 * trade ledger. Size is always one unit, so pnl is in price units.
 */
export class PositionTracker {
  private position: Position | null = null;
  private completedTrades: Trade[] = [];
  private cash: number;

  constructor(initialCash: number) {
    this.cash = initialCash;
  }

  getPosition(): Position | null {
    return this.position;
  }

  isFlat(): boolean {
    return this.position === null;
  }

  getCash(): number {
    return this.cash;
  }

  getCompletedTrades(): Trade[] {
    return this.completedTrades;
  }

  openPosition(
    direction: Direction,
    price: number,
    timestamp: number,
    barIndex: number,
    entryAtr: number | null,
  ): Position {
    if (this.position) {
      throw new Error("Cannot open position: already in a position");
    }
    this.position = {
      direction,
      entryPrice: price,
      entryTimestamp: timestamp,
      entryBarIndex: barIndex,
      entryAtr,
    };
    return this.position;
  }

  /** Mark-to-market pnl of the open position; 0 when flat. */
  unrealizedPnl(price: number): number {
    if (!this.position) return 0;
    const { direction, entryPrice } = this.position;
    return direction === "long" ? price - entryPrice : entryPrice - price;
  }

  /**
   * Close the position, realize its pnl into cash and append the trade.
   */
  closePosition(price: number, timestamp: number, barIndex: number, reason: ExitReason): Trade {
    if (!this.position) {
      throw new Error("Cannot close position: no position open");
    }

    const { direction, entryPrice, entryTimestamp, entryBarIndex } = this.position;
    const pnl = this.unrealizedPnl(price);

    const trade: Trade = {
      direction,
      entryTs: entryTimestamp,
      exitTs: timestamp,
      entryPrice,
      exitPrice: price,
      pnl,
      exitReason: reason,
      entryBarIndex,
      exitBarIndex: barIndex,
    };

    this.cash += pnl;
    this.completedTrades.push(trade);
    this.position = null;

    return trade;
  }
}

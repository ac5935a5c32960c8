import type { EquityPoint } from "../types/trade.js";

export class EquityCurve {
  private points: EquityPoint[] = [];
  private peak: number;

  /** Drawdown is measured from `initialCapital` until equity first exceeds it. */
  constructor(initialCapital: number) {
    this.peak = initialCapital;
  }

  /** Append the marked-to-market equity for one bar. */
  mark(timestamp: number, equity: number): void {
    if (equity > this.peak) {
      this.peak = equity;
    }
    const drawdown = this.peak > 0 ? (equity - this.peak) / this.peak : 0;
    this.points.push({ timestamp, equity, drawdown });
  }

  getMaxDrawdownPct(): number {
    let maxDd = 0;
    for (const p of this.points) {
      if (p.drawdown < maxDd) maxDd = p.drawdown;
    }
    return maxDd * 100; // negative percentage
  }

  getPoints(): EquityPoint[] {
    return [...this.points];
  }
}

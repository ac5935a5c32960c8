import { z } from "zod";

export interface Bar {
  t: number; // timestamp ms
  o: number; // open
  h: number; // high
  l: number; // low
  c: number; // close
}

export const BarSchema = z.object({
  t: z.number().int(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
});

/**
 * Column-oriented bars. Every column has the same length and index i of each
 * column describes the same bar.
 */
export interface BarSeries {
  timestamps: readonly number[];
  open: readonly number[];
  high: readonly number[];
  low: readonly number[];
  close: readonly number[];
}

export function toBarSeries(bars: readonly Bar[]): BarSeries {
  return {
    timestamps: bars.map((b) => b.t),
    open: bars.map((b) => b.o),
    high: bars.map((b) => b.h),
    low: bars.map((b) => b.l),
    close: bars.map((b) => b.c),
  };
}

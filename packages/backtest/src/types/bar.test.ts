import { describe, it, expect } from "vitest";
import { BarSchema, toBarSeries } from "./bar.js";
import type { Bar } from "./bar.js";

describe("BarSchema", () => {
  it("validates a valid bar", () => {
    const bar: Bar = { t: 1_700_000_000_000, o: 100, h: 105, l: 98, c: 103 };
    expect(BarSchema.parse(bar)).toEqual(bar);
  });

  it("rejects missing fields", () => {
    expect(() => BarSchema.parse({ t: 1, o: 2 })).toThrow();
  });

  it("rejects a fractional timestamp", () => {
    expect(() => BarSchema.parse({ t: 1.5, o: 1, h: 2, l: 0.5, c: 1.5 })).toThrow();
  });

  it("rejects NaN prices", () => {
    // missing prices belong in a BarSeries column, not in a row
    expect(BarSchema.safeParse({ t: 1, o: NaN, h: 2, l: 1, c: 1.5 }).success).toBe(false);
  });
});

describe("toBarSeries", () => {
  it("splits rows into aligned columns", () => {
    const bars: Bar[] = [
      { t: 1000, o: 10, h: 12, l: 9, c: 11 },
      { t: 2000, o: 11, h: 13, l: 10, c: 12 },
    ];
    expect(toBarSeries(bars)).toEqual({
      timestamps: [1000, 2000],
      open: [10, 11],
      high: [12, 13],
      low: [9, 10],
      close: [11, 12],
    });
  });

  it("returns empty columns for no bars", () => {
    const series = toBarSeries([]);
    expect(series.timestamps).toEqual([]);
    expect(series.close).toEqual([]);
  });
});

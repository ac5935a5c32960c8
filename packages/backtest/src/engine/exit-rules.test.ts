import { describe, it, expect } from "vitest";
import { computeStopLevels, resolveExit, type StopLevels } from "./exit-rules.js";
import type { Position } from "../types/trade.js";

function makePosition(direction: "long" | "short", entryPrice = 100, entryAtr: number | null = null): Position {
  return { direction, entryPrice, entryTimestamp: 0, entryBarIndex: 0, entryAtr };
}

describe("computeStopLevels", () => {
  it("prices fixed stops below a long entry and targets above", () => {
    const levels = computeStopLevels(makePosition("long"), { mode: "fixed", slPct: 0.02, tpPct: 0.04 });
    expect(levels.slPrice).toBeCloseTo(98, 10);
    expect(levels.tpPrice).toBeCloseTo(104, 10);
  });

  it("mirrors fixed stops for a short", () => {
    const levels = computeStopLevels(makePosition("short"), { mode: "fixed", slPct: 0.02, tpPct: 0.04 });
    expect(levels.slPrice).toBeCloseTo(102, 10);
    expect(levels.tpPrice).toBeCloseTo(96, 10);
  });

  it("disables the target when tpPct is 0", () => {
    const levels = computeStopLevels(makePosition("long"), { mode: "fixed", slPct: 0.02, tpPct: 0 });
    expect(levels.tpPrice).toBeNull();
  });

  it("uses the entry ATR for ATR stops", () => {
    const levels = computeStopLevels(makePosition("long", 100, 2), {
      mode: "atr",
      slMult: 1.5,
      tpMult: 3,
      atr: [50, 50],
    });
    expect(levels).toEqual({ slPrice: 97, tpPrice: 106 });
  });

  it("mirrors ATR stops for a short", () => {
    const levels = computeStopLevels(makePosition("short", 100, 2), {
      mode: "atr",
      slMult: 1.5,
      tpMult: 0,
      atr: [],
    });
    expect(levels).toEqual({ slPrice: 103, tpPrice: null });
  });

  it("yields NaN levels when the entry ATR is missing", () => {
    const levels = computeStopLevels(makePosition("long", 100, NaN), {
      mode: "atr",
      slMult: 2,
      tpMult: 2,
      atr: [],
    });
    expect(levels.slPrice).toBeNaN();
    expect(levels.tpPrice).toBeNaN();
  });
});

describe("resolveExit", () => {
  const longLevels: StopLevels = { slPrice: 95, tpPrice: 105 };
  const shortLevels: StopLevels = { slPrice: 105, tpPrice: 95 };

  it("returns null when neither level is touched", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 100, high: 104, low: 96 })).toBeNull();
  });

  it("fills a long stop at the stop price", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 100, high: 101, low: 94 })).toEqual({
      price: 95,
      reason: "sl",
    });
  });

  it("fills a long stop at the open on a gap down", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 90, high: 92, low: 88 })).toEqual({
      price: 90,
      reason: "sl",
    });
  });

  it("fills a long target at the target price", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 101, high: 106, low: 100 })).toEqual({
      price: 105,
      reason: "tp",
    });
  });

  it("fills a long target at the open on a gap up", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 108, high: 110, low: 107 })).toEqual({
      price: 108,
      reason: "tp",
    });
  });

  it("prefers the stop when both levels are touched", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 100, high: 106, low: 94 })).toEqual({
      price: 95,
      reason: "sl",
    });
    expect(resolveExit(makePosition("short"), shortLevels, { open: 100, high: 106, low: 94 })).toEqual({
      price: 105,
      reason: "sl",
    });
  });

  it("triggers on an exact touch", () => {
    expect(resolveExit(makePosition("long"), longLevels, { open: 100, high: 101, low: 95 })?.reason).toBe("sl");
    expect(resolveExit(makePosition("long"), longLevels, { open: 100, high: 105, low: 96 })?.reason).toBe("tp");
  });

  it("fills short stops and targets with the sides swapped", () => {
    expect(resolveExit(makePosition("short"), shortLevels, { open: 100, high: 106, low: 99 })).toEqual({
      price: 105,
      reason: "sl",
    });
    expect(resolveExit(makePosition("short"), shortLevels, { open: 110, high: 111, low: 108 })).toEqual({
      price: 110,
      reason: "sl",
    });
    expect(resolveExit(makePosition("short"), shortLevels, { open: 99, high: 100, low: 94 })).toEqual({
      price: 95,
      reason: "tp",
    });
    expect(resolveExit(makePosition("short"), shortLevels, { open: 92, high: 93, low: 90 })).toEqual({
      price: 92,
      reason: "tp",
    });
  });

  it("ignores a disabled target", () => {
    expect(resolveExit(makePosition("long"), { slPrice: 95, tpPrice: null }, { open: 100, high: 500, low: 99 })).toBeNull();
  });

  it("never triggers on NaN levels", () => {
    expect(resolveExit(makePosition("long"), { slPrice: NaN, tpPrice: NaN }, { open: 1, high: 1000, low: 0 })).toBeNull();
  });
});

import { describe, it, expect } from "vitest";
import { bollinger } from "./bollinger.js";
import { InvalidArgumentError } from "../errors.js";

describe("bollinger", () => {
  it("throws InvalidArgumentError on period 0", () => {
    expect(() => bollinger([1, 2], 0, 2)).toThrow(InvalidArgumentError);
  });

  it("builds bands around the SMA", () => {
    // window [1, 3]: mean 2, sample sd sqrt(2)
    const { upper, middle, lower } = bollinger([1, 3], 2, 2);
    expect(middle[1]).toBeCloseTo(2, 10);
    expect(upper[1]).toBeCloseTo(2 + 2 * Math.SQRT2, 10);
    expect(lower[1]).toBeCloseTo(2 - 2 * Math.SQRT2, 10);
  });

  it("collapses to the middle band on flat prices", () => {
    const { upper, middle, lower } = bollinger([4, 4, 4], 3, 1.5);
    expect(upper[2]).toBe(4);
    expect(middle[2]).toBe(4);
    expect(lower[2]).toBe(4);
  });

  it("is NaN during warm-up", () => {
    const { upper, lower } = bollinger([1, 2, 3], 3, 2);
    expect(upper[0]).toBeNaN();
    expect(lower[1]).toBeNaN();
  });
});

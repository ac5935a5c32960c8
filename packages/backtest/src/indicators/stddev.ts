import { assertPeriod } from "../errors.js";
import { rollingStdDev } from "./rolling.js";

/** Rolling sample standard deviation; NaN entries inside a window are skipped. */
export function stddev(values: readonly number[], period: number): number[] {
  assertPeriod(period, "stddev period");
  return rollingStdDev(values, period);
}

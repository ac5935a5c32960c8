/**
 * Rolling-window primitives shared by every indicator. All outputs have the
 * input's length, with NaN wherever the value is undefined.
 */

/**
 * NaN-aware trailing mean. Keeps a running sum and count of the non-NaN
 * values in the last `window` positions and emits `sum / window` only when
 * the whole window is NaN-free.
 */
export function rollingMean(values: readonly number[], window: number): number[] {
  const out = new Array<number>(values.length).fill(NaN);
  if (window < 1) return out;

  let sum = 0;
  let count = 0;
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!Number.isNaN(v)) {
      sum += v;
      count++;
    }
    if (i >= window) {
      const evicted = values[i - window];
      if (!Number.isNaN(evicted)) {
        sum -= evicted;
        count--;
      }
    }
    if (count === window) {
      out[i] = sum / count;
    }
  }
  return out;
}

/**
 * Exponential smoothing with alpha = 2 / (period + 1), seeded with the first
 * value. The recursion runs from index 0 but values are only emitted from
 * `period - 1` on, so early outputs still carry some seed bias.
 *
 * NaN is absorbing: a NaN input poisons every later value.
 */
export function emaRecursion(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(NaN);
  if (period < 1 || values.length === 0) return out;

  const alpha = 2 / (period + 1);
  let ema = values[0];
  for (let i = 0; i < values.length; i++) {
    if (i > 0) {
      ema = alpha * values[i] + (1 - alpha) * ema;
    }
    if (i + 1 >= period) {
      out[i] = ema;
    }
  }
  return out;
}

/**
 * Sample standard deviation over the trailing `period` positions, skipping
 * NaN entries. A window with one usable value yields 0, with none NaN.
 * Two passes per index: O(n * period).
 */
export function rollingStdDev(values: readonly number[], period: number): number[] {
  const out = new Array<number>(values.length).fill(NaN);
  if (period < 1) return out;

  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    let count = 0;
    for (let j = i + 1 - period; j <= i; j++) {
      if (!Number.isNaN(values[j])) {
        sum += values[j];
        count++;
      }
    }
    if (count === 0) continue;

    const mean = sum / count;
    let sumSqDiff = 0;
    for (let j = i + 1 - period; j <= i; j++) {
      if (!Number.isNaN(values[j])) {
        const d = values[j] - mean;
        sumSqDiff += d * d;
      }
    }
    out[i] = count > 1 ? Math.sqrt(sumSqDiff / (count - 1)) : 0;
  }
  return out;
}

/** `value` when it is a finite number, otherwise `fallback` (NaN, +/-Infinity). */
export function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

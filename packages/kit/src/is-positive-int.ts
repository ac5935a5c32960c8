/** True for integers >= 1. Window and period arguments go through this. */
export function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

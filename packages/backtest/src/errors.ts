import { isPositiveInt } from "@tickforge/kit";

/**
 * Raised for malformed calls only: a zero window, series of different
 * lengths, ATR stops without an ATR series. Degenerate data (NaN windows,
 * empty input, zero average loss) never throws; it yields NaN or a sentinel.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: InvalidArgumentError };

/**
 * Runs `fn` and captures an InvalidArgumentError as a failed Result.
 * Any other error is a bug and is rethrown.
 */
export function tryResult<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function assertPeriod(value: number, label: string): number {
  if (!isPositiveInt(value)) {
    throw new InvalidArgumentError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Result<T, E>: explicit success/failure for fallible steps.
 *
 * Used where a caller must decide what a failure means (retry,
 * dead-letter, reject) instead of letting an exception propagate.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Normalize any thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Run a synchronous function, capturing a thrown error as a failed Result.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (e: unknown) {
    return err(toError(e));
  }
}

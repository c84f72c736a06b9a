/**
 * Common type definitions used throughout the project
 */

/**
 * Point in time as milliseconds since the Unix epoch
 */
export type Instant = number;

/**
 * Outcome of an operation that can fail with a known, closed set of errors.
 * Acquisition code returns these instead of throwing.
 */
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Wrap a successful value
 * @param value - Value to wrap
 * @returns Successful result
 */
export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value: value };
}

/**
 * Wrap a failure
 * @param error - Error to wrap
 * @returns Failed result
 */
export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error: error };
}

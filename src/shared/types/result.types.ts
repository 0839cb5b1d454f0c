/**
 * =============================================================================
 * SHARED TYPES
 * =============================================================================
 *
 * Result is used where a failure is expected and the caller decides
 * what to do with it (reverse geocoding). Everything else throws AppError.
 * =============================================================================
 */

/**
 * Success or failure of an operation that does not throw
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Helper to create a success result
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Helper to create a failure result
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Location coordinates
 */
export interface Coordinates {
  latitude: number;
  longitude: number;
}

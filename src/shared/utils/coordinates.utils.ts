/**
 * =============================================================================
 * COORDINATE UTILITIES - Normalization & Formatting
 * =============================================================================
 *
 * Coordinates travel through input and output files either as numbers or
 * as strings. Internally they are kept as fixed-precision strings so that
 * the output file shows exactly what was sent to the routing service.
 *
 * NOTE: no range checks. Out-of-range latitude/longitude values pass
 * through unchanged and are left for the upstream services to reject.
 * =============================================================================
 */

import { COORDINATES } from '../../core/constants';

/**
 * Raw coordinate as found in an input file
 */
export type RawCoordinate = string | number | null | undefined;

/**
 * Format a coordinate with exactly 6 digits after the decimal point.
 *
 * @example formatCoordinate(55.7558) // "55.755800"
 */
export function formatCoordinate(value: number): string {
  return value.toFixed(COORDINATES.PRECISION);
}

/**
 * Normalize a raw coordinate:
 * - absent, null, empty or blank string -> null
 * - number -> 6-decimal string
 * - string -> trimmed, otherwise unchanged
 */
export function normalizeCoordinate(raw: RawCoordinate): string | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? formatCoordinate(raw) : null;
  }

  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Parse a normalized coordinate string back to a float.
 * The whole string must be numeric, otherwise NaN ("55,7" is not 55).
 */
export function parseCoordinate(value: string): number {
  return value.trim() === '' ? NaN : Number(value);
}

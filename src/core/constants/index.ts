/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Application-specific error codes
 *
 * PATTERN: Hierarchical error codes
 * - 2xxx: Input & validation errors
 * - 4xxx: Lookup errors
 * - 9xxx: Configuration & upstream errors
 */
export enum ErrorCode {
  // =============================================================================
  // INPUT & VALIDATION (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',
  INPUT_POINT_MISSING = 'VAL_2002',
  INPUT_FILE_INVALID = 'VAL_2003',

  // =============================================================================
  // LOOKUP (4xxx)
  // =============================================================================
  GEOCODE_NOT_FOUND = 'GEO_4001',

  // =============================================================================
  // SYSTEM (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001',
  CONFIGURATION_MISSING = 'SYS_9002',
  UPSTREAM_HTTP_ERROR = 'SYS_9003',
  UPSTREAM_BAD_RESPONSE = 'SYS_9004',
  UPSTREAM_TIMEOUT = 'SYS_9005',
}

// =============================================================================
// COORDINATES
// =============================================================================

export const COORDINATES = {
  // Digits after the decimal point in normalized coordinate strings
  PRECISION: 6,
} as const;

// =============================================================================
// TIMEOUTS
// =============================================================================

export const TIMEOUTS = {
  GEOCODER: 10 * 1000,           // 10 seconds
  ROUTING: 15 * 1000,            // 15 seconds
} as const;

// =============================================================================
// ROUTING
// =============================================================================

/**
 * Vehicle dimension keys passed through to the routing service
 */
export const VEHICLE_PARAM_KEYS = [
  'height',
  'width',
  'length',
  'weight',
  'axle_weight',
  'hazard_class',
] as const;

export type VehicleParamKey = typeof VEHICLE_PARAM_KEYS[number];

/**
 * Upstream bodies are embedded in error messages up to this length
 */
export const MAX_ERROR_BODY_LENGTH = 2000;

// =============================================================================
// CLI DEFAULTS
// =============================================================================

export const DEFAULT_FILES = {
  INPUT: 'input.json',
  OUTPUT: 'output.json',
  BATCH_OUTPUT: 'output_batch.json',
} as const;

/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a client
 * throw new ConfigurationError('GEOCODER_API_KEY');
 *
 * // In the resolver
 * throw new InputError('[route-1 / loading] Neither coordinates nor address given');
 * ```
 *
 * TAXONOMY:
 * - ConfigurationError: missing API key, fatal for the operation needing it
 * - NotFoundError:      geocoder returned zero results
 * - UpstreamError:      non-2xx status, timeout or malformed response body
 * - InputError:         point has neither address nor coordinates
 * - ValidationError:    input file does not match its schema
 *
 * =============================================================================
 */

import { ErrorCode, MAX_ERROR_BODY_LENGTH } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to the output file's error shape
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        timestamp: this.timestamp,
      }
    };
  }
}

/**
 * Error output format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Required API key is not configured
 */
export class ConfigurationError extends AppError {
  constructor(variable: string, purpose?: string) {
    super(
      `${variable} is not set${purpose ? ` (required for ${purpose})` : ''}`,
      ErrorCode.CONFIGURATION_MISSING,
      true,
      { variable }
    );
  }
}

/**
 * Lookup returned no results
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.GEOCODE_NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

/**
 * Upstream service failed or answered with something unexpected.
 * The raw body is kept in details.body and embedded (truncated) in the message.
 */
export class UpstreamError extends AppError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(
    message: string,
    options: { status?: number; body?: string; code?: ErrorCode } = {}
  ) {
    const { status, body, code = ErrorCode.UPSTREAM_BAD_RESPONSE } = options;
    super(
      body !== undefined ? `${message}: ${truncate(body, MAX_ERROR_BODY_LENGTH)}` : message,
      code,
      true,
      { status, body }
    );
    this.status = status;
    this.body = body;
  }
}

/**
 * Point carries neither address nor coordinates
 */
export class InputError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.INPUT_POINT_MISSING,
    details?: Record<string, unknown>
  ) {
    super(message, code, true, details);
  }
}

/**
 * Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(
      errors.length > 0
        ? `${message}: ${errors.map(e => `${e.field || '(root)'}: ${e.message}`).join('; ')}`
        : message,
      code,
      true,
      { errors }
    );
    this.errors = errors;
  }

  static fromZodError(
    zodError: { errors: Array<{ path: (string | number)[]; message: string }> },
    message?: string
  ): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(message, errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Wrap anything thrown into an AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }
  return new AppError(String(error), ErrorCode.INTERNAL_ERROR, false);
}

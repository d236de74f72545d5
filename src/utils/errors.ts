/**
 * Error types and codes for hydrate-notation.
 *
 * Traversal never throws these: nodes hand them to a diagnostics sink and
 * return a degraded value instead. Only file loading and option validation
 * throw (see SystemError).
 */

/**
 * Base error class for all hydrate-notation errors.
 */
export class HydrateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HydrateError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A value outside the supported primitive set, a coercion that has no
 * meaningful result, or a value a renderer refused.
 * Codes: T001-T003
 */
export class TypeConversionError extends HydrateError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TypeConversionError';
  }
}

/**
 * Index access on a mapping, attribute access on a sequence, or an index
 * out of bounds.
 * Codes: A001-A003
 */
export class AccessPatternError extends HydrateError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AccessPatternError';
  }
}

/**
 * Invalid use of the public API: an unknown output selector or a malformed
 * path expression.
 * Codes: U001-U002
 */
export class APIUsageError extends HydrateError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'APIUsageError';
  }
}

/**
 * System errors (file not found, parse errors in a named format, bad options).
 * Codes: S001-S003
 */
export class SystemError extends HydrateError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Type conversion (T001-T003)
  UNSUPPORTED_TYPE: 'T001',
  COERCION_FAILED: 'T002',
  RENDER_FAILED: 'T003',

  // Access pattern (A001-A003)
  INDEX_ON_MAPPING: 'A001',
  ATTRIBUTE_ON_SEQUENCE: 'A002',
  INDEX_OUT_OF_BOUNDS: 'A003',

  // API usage (U001-U002)
  INVALID_SELECTOR: 'U001',
  INVALID_PATH: 'U002',

  // System (S001-S003)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  INVALID_OPTIONS: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

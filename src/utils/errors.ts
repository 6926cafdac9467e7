/**
 * Error types and codes for accessorize.
 * Every error thrown across a module boundary extends AccessorizeError.
 */

/**
 * Base error class for all accessorize errors.
 */
export class AccessorizeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AccessorizeError';
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
 * Run configuration errors (loading, parsing, validation).
 * Error codes: C001-C003
 */
export class ConfigError extends AccessorizeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Transform registry errors (unknown transform, bad transform options).
 * Error codes: R001-R002
 */
export class RegistryError extends AccessorizeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * Malformed compilation-unit documents handed over by the front end.
 * Error codes: F001-F002
 */
export class FrontEndError extends AccessorizeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FrontEndError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S002
 */
export class SystemError extends AccessorizeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  INVALID_CONFIG: 'C001',
  CONFIG_NOT_FOUND: 'C002',
  OUTPUT_OUTSIDE_ROOT: 'C003',

  // Registry errors
  UNKNOWN_TRANSFORM: 'R001',
  INVALID_TRANSFORM_OPTIONS: 'R002',

  // Front-end document errors
  INVALID_UNIT: 'F001',
  SPAN_OUT_OF_RANGE: 'F002',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

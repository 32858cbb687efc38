/**
 * Error types and codes for phonescope.
 * All errors raised by the tool extend PhoneScopeError.
 */

/**
 * Base error class for all phonescope errors.
 */
export class PhoneScopeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PhoneScopeError';
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
 * Input that cannot be turned into a phone number.
 * Error codes: P001-P003
 */
export class InvalidInputError extends PhoneScopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InvalidInputError';
  }
}

/**
 * Configuration-related errors (loading, validation).
 */
export class ConfigError extends PhoneScopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends PhoneScopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Input errors
  EMPTY_INPUT: 'P001',
  MALFORMED_INPUT: 'P002',
  UNPARSABLE_NUMBER: 'P003',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // System errors
  PARSE_ERROR: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Type guard for invalid-input conditions.
 */
export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

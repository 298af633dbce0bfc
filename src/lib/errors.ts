/**
 * Structured Error Classes for ambry provisioning
 *
 * Every error carries a code from `ErrorCodes` so the CLI can map failures
 * to log records and exit statuses.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_EXISTS: 'CONFIG_EXISTS',
  RESOURCE_NOT_FOUND: 'RESOURCE_NOT_FOUND',

  // Provisioning errors
  COMMAND_FAILED: 'COMMAND_FAILED',
  OUTPUT_LIMIT_EXCEEDED: 'OUTPUT_LIMIT_EXCEEDED',
  RELEASE_DETECTION_FAILED: 'RELEASE_DETECTION_FAILED',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all provisioning errors
 */
export class ProvisionError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'ProvisionError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * Validation errors for input validation failures
 */
export class ValidationError extends ProvisionError {
  constructor(
    message: string,
    public readonly violations: Array<{ path: string; message: string }> = [],
    cause?: Error,
  ) {
    super(message, ErrorCodes.VALIDATION_FAILED, { violations }, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration file and resource errors
 */
export class ConfigurationError extends ProvisionError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIG_INVALID,
    public readonly path?: string,
    cause?: Error,
  ) {
    super(message, code, { path }, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * External command failures
 */
export class CommandError extends ProvisionError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    code: ErrorCode = ErrorCodes.COMMAND_FAILED,
    cause?: Error,
  ) {
    super(message, code, { command, exitCode }, cause);
    this.name = 'CommandError';
  }
}

export class ReleaseDetectionError extends ProvisionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.RELEASE_DETECTION_FAILED, details, cause);
    this.name = 'ReleaseDetectionError';
  }
}

/**
 * Type guard to check if an error is a ProvisionError
 */
export function isProvisionError(error: unknown): error is ProvisionError {
  return error instanceof ProvisionError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

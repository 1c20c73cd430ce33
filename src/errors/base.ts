/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the configuration interpretation pipeline.
 * Provides a hierarchical error structure with serialization and
 * error cause chaining.
 */

import { ErrorCode, GeneralErrorCodes, isFatalCode } from './codes';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Pipeline stage being executed */
  stage?: string;
  /** Module path the error is scoped to */
  module?: string;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  fatal: boolean;
  timestamp: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all pipeline errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Whether the error aborts the whole run */
  public readonly fatal: boolean;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (bad input, unreachable source).
   * Non-operational errors are bugs that require attention.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.fatal = isFatalCode(code);
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      fatal: this.fatal,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
    };
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

// ============================================================================
// Error Factory Utilities
// ============================================================================

/**
 * Non-operational wrapper around an error that is not a BaseError
 */
class WrappedError extends BaseError {
  constructor(message: string, code: ErrorCode, context: ErrorContext) {
    super(message, code, context, false);
    this.name = 'WrappedError';
  }
}

/**
 * Wrap an unknown error into a BaseError; pipeline errors pass through
 */
export function wrapError(
  error: unknown,
  message?: string,
  code: ErrorCode = GeneralErrorCodes.INTERNAL_ERROR
): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new WrappedError(message ?? error.message, code, { cause: error });
  }

  return new WrappedError(message ?? String(error), code, { details: { originalValue: error } });
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the chart options generator.
 * Provides a hierarchical error structure with serialization
 * and error cause chaining.
 */

import { type ErrorCode, getExitStatusForCode } from './codes.js';

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
  /** Operation being performed */
  operation?: string;
}

/**
 * Serialized error format for log output
 */
export interface SerializedError {
  name: string;
  message: string;
  code: ErrorCode;
  exitStatus: number;
  timestamp: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all generator errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected (bad input, failed command);
   * non-operational errors are bugs.
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
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Process exit status for this error
   */
  get exitStatus(): number {
    return getExitStatusForCode(this.code);
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitStatus: this.exitStatus,
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

/**
 * Error Handling Module
 * @module errors
 *
 * Error classes and exit-status mapping for the chart options generator.
 *
 * @example
 * ```typescript
 * import { InputCaptureError, isBaseError } from './errors/index.js';
 *
 * try {
 *   await source.read();
 * } catch (error) {
 *   if (isBaseError(error)) process.exitCode = error.exitStatus;
 * }
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

export {
  InputErrorCodes,
  GenerationErrorCodes,
  UsageErrorCodes,
  GeneralErrorCodes,
  ErrorCodes,
  type ErrorCode,
  type InputErrorCode,
  type GenerationErrorCode,
  type UsageErrorCode,
  type GeneralErrorCode,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_USAGE,
  errorCodeToExitStatus,
  getExitStatusForCode,
} from './codes.js';

// ============================================================================
// Base Error Classes
// ============================================================================

export {
  BaseError,
  type ErrorContext,
  type SerializedError,
  isBaseError,
  getErrorMessage,
} from './base.js';

// ============================================================================
// Domain Errors
// ============================================================================

export {
  InputCaptureError,
  InputReadError,
  InvalidFlagNameError,
  KeyCollisionError,
  UsageError,
  ConfigurationError,
  InternalError,
} from './domain.js';

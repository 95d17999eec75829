/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the chart options generator, plus the
 * process exit status each code maps to.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Input Error Codes
 */
export const InputErrorCodes = {
  INPUT_CAPTURE_FAILED: 'INPUT_CAPTURE_FAILED',
  INPUT_READ_FAILED: 'INPUT_READ_FAILED',
} as const;

export type InputErrorCode = typeof InputErrorCodes[keyof typeof InputErrorCodes];

/**
 * Generation Error Codes
 */
export const GenerationErrorCodes = {
  INVALID_FLAG_NAME: 'INVALID_FLAG_NAME',
  KEY_COLLISION: 'KEY_COLLISION',
} as const;

export type GenerationErrorCode = typeof GenerationErrorCodes[keyof typeof GenerationErrorCodes];

/**
 * Usage and Configuration Error Codes
 */
export const UsageErrorCodes = {
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
} as const;

export type UsageErrorCode = typeof UsageErrorCodes[keyof typeof UsageErrorCodes];

/**
 * General Error Codes
 */
export const GeneralErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCodes[keyof typeof GeneralErrorCodes];

// ============================================================================
// Combined Codes
// ============================================================================

export const ErrorCodes = {
  ...InputErrorCodes,
  ...GenerationErrorCodes,
  ...UsageErrorCodes,
  ...GeneralErrorCodes,
} as const;

export type ErrorCode =
  | InputErrorCode
  | GenerationErrorCode
  | UsageErrorCode
  | GeneralErrorCode;

// ============================================================================
// Exit Status Mapping
// ============================================================================

/** Exit status for a successful run */
export const EXIT_SUCCESS = 0;

/** Exit status for unexpected failures */
export const EXIT_FAILURE = 1;

/** Exit status for bad arguments or configuration */
export const EXIT_USAGE = 2;

/**
 * Mapping from error code to process exit status.
 * {@link InputCaptureError} overrides its entry with the status of the
 * command that failed.
 */
export const errorCodeToExitStatus: Record<ErrorCode, number> = {
  [InputErrorCodes.INPUT_CAPTURE_FAILED]: EXIT_FAILURE,
  [InputErrorCodes.INPUT_READ_FAILED]: EXIT_FAILURE,
  [GenerationErrorCodes.INVALID_FLAG_NAME]: EXIT_FAILURE,
  [GenerationErrorCodes.KEY_COLLISION]: EXIT_FAILURE,
  [UsageErrorCodes.INVALID_ARGUMENTS]: EXIT_USAGE,
  [UsageErrorCodes.INVALID_CONFIGURATION]: EXIT_USAGE,
  [GeneralErrorCodes.INTERNAL_ERROR]: EXIT_FAILURE,
};

/**
 * Get the process exit status for an error code
 */
export function getExitStatusForCode(code: ErrorCode): number {
  return errorCodeToExitStatus[code];
}

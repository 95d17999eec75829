/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised while reading a help listing and turning it into chart options.
 */

import { BaseError, type ErrorContext } from './base.js';
import {
  GeneralErrorCodes,
  GenerationErrorCodes,
  InputErrorCodes,
  UsageErrorCodes,
} from './codes.js';

// ============================================================================
// Input Errors
// ============================================================================

/**
 * A build or help command exited with a non-zero status.
 * The generator exits with the same status and prints nothing.
 */
export class InputCaptureError extends BaseError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(command: string, exitCode: number, stderr = '', context: ErrorContext = {}) {
    super(
      `Command "${command}" exited with status ${exitCode}`,
      InputErrorCodes.INPUT_CAPTURE_FAILED,
      { ...context, details: { ...context.details, command, exitCode } }
    );
    this.name = 'InputCaptureError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }

  override get exitStatus(): number {
    return this.exitCode;
  }
}

/**
 * The help listing could not be read (missing file, unreadable stdin)
 */
export class InputReadError extends BaseError {
  public readonly source: string;

  constructor(source: string, message: string, context: ErrorContext = {}) {
    super(`Failed to read input from ${source}: ${message}`, InputErrorCodes.INPUT_READ_FAILED, context);
    this.name = 'InputReadError';
    this.source = source;
  }
}

// ============================================================================
// Generation Errors
// ============================================================================

/**
 * A flag name that cannot be turned into a configuration key
 */
export class InvalidFlagNameError extends BaseError {
  public readonly flagName: string;

  constructor(flagName: string, reason = 'flag name must not be empty') {
    super(
      `Invalid flag name "${flagName}": ${reason}`,
      GenerationErrorCodes.INVALID_FLAG_NAME,
      {},
      false
    );
    this.name = 'InvalidFlagNameError';
    this.flagName = flagName;
  }
}

/**
 * Two distinct flags collapse to the same configuration key
 */
export class KeyCollisionError extends BaseError {
  public readonly key: string;
  public readonly flags: readonly string[];

  constructor(key: string, flags: readonly string[]) {
    super(
      `Flags ${flags.map((f) => `--${f}`).join(', ')} all map to configuration key "${key}"`,
      GenerationErrorCodes.KEY_COLLISION,
      { details: { key, flags } }
    );
    this.name = 'KeyCollisionError';
    this.key = key;
    this.flags = flags;
  }
}

// ============================================================================
// Usage Errors
// ============================================================================

/**
 * Invalid command-line arguments
 */
export class UsageError extends BaseError {
  constructor(message: string) {
    super(message, UsageErrorCodes.INVALID_ARGUMENTS);
    this.name = 'UsageError';
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;
  public readonly issues: readonly string[];

  constructor(configKey: string, message?: string, issues: readonly string[] = [], context: ErrorContext = {}) {
    super(
      message ?? `Invalid configuration: ${configKey}`,
      UsageErrorCodes.INVALID_CONFIGURATION,
      context
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.issues = issues;
  }

  static invalid(configKey: string, expected: string, actualValue: unknown): ConfigurationError {
    return new ConfigurationError(
      configKey,
      `Invalid configuration '${configKey}': expected ${expected}, got ${typeof actualValue}`
    );
  }
}

/**
 * Wraps an unexpected failure so the CLI can report it uniformly.
 * Not operational: the CLI logs it with the stack of its root cause.
 */
export class InternalError extends BaseError {
  constructor(message: string, cause?: Error) {
    super(message, GeneralErrorCodes.INTERNAL_ERROR, { cause }, false);
    this.name = 'InternalError';
  }
}

/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the chart options generator.
 * Logs always go to stderr: stdout carries the generated chart fragments.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  operation?: string;
  source?: string;
  module?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  service: string;
  version: string;
}

/**
 * Options accepted by {@link createLogger}
 */
export interface CreateLoggerOptions {
  level?: string;
  pretty?: boolean;
  /** Where log lines go; defaults to stderr */
  destination?: DestinationStream;
  baseContext?: LogContext;
}

/**
 * Domain-specific logging methods
 */
export interface GeneratorLogMethods {
  withContext(context: LogContext): GeneratorLogger;

  sourceRead(source: string, bytes: number, duration: number): void;
  flagsExtracted(count: number, lineCount: number): void;
  flagExcluded(flag: string, rule: string): void;
  keyCollision(key: string, flags: readonly string[]): void;
  captureFailed(command: string, exitCode: number): void;
  generationCompleted(optionCount: number, excludedCount: number, duration: number): void;
}

export type GeneratorLogger = Logger & GeneratorLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function readDefaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'warn',
    pretty: process.env.LOG_PRETTY === 'true',
    service: process.env.SERVICE_NAME || 'chart-options-generator',
    version: process.env.SERVICE_VERSION || '1.0.0',
  };
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): GeneratorLogger {
  const methods: GeneratorLogMethods = {
    withContext(context: LogContext): GeneratorLogger {
      return extendWithDomainMethods(logger.child(context));
    },

    sourceRead(source: string, bytes: number, duration: number) {
      logger.debug(
        {
          event: 'source_read',
          source,
          bytes,
          durationMs: duration,
        },
        `Read ${bytes} bytes from ${source} in ${duration}ms`
      );
    },

    flagsExtracted(count: number, lineCount: number) {
      logger.debug(
        {
          event: 'flags_extracted',
          flagCount: count,
          lineCount,
        },
        `Extracted ${count} flags from ${lineCount} lines`
      );
    },

    flagExcluded(flag: string, rule: string) {
      logger.debug(
        {
          event: 'flag_excluded',
          flag,
          rule,
        },
        `Excluded --${flag} (${rule})`
      );
    },

    keyCollision(key: string, flags: readonly string[]) {
      logger.warn(
        {
          event: 'key_collision',
          key,
          flags,
        },
        `Configuration key ${key} is shared by ${flags.map((f) => `--${f}`).join(', ')}`
      );
    },

    captureFailed(command: string, exitCode: number) {
      logger.error(
        {
          event: 'capture_failed',
          command,
          exitCode,
        },
        `Command failed with exit status ${exitCode}: ${command}`
      );
    },

    generationCompleted(optionCount: number, excludedCount: number, duration: number) {
      logger.info(
        {
          event: 'generation_completed',
          optionCount,
          excludedCount,
          durationMs: duration,
        },
        `Generated ${optionCount} chart options (${excludedCount} excluded) in ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, options: CreateLoggerOptions = {}): GeneratorLogger {
  const config = readDefaultConfig();
  const level = options.level ?? config.level;
  const pretty = options.pretty ?? config.pretty;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
    },
  };

  let destination: DestinationStream;

  if (options.destination) {
    destination = options.destination;
  } else if (pretty) {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        destination: 2,
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service,version',
        messageFormat: '{msg}',
      },
    });
  } else {
    destination = pino.destination({ dest: 2, sync: true });
  }

  const baseLogger = pino(loggerOptions, destination);
  const logger = options.baseContext ? baseLogger.child(options.baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: GeneratorLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): GeneratorLogger {
  if (!rootLogger) {
    rootLogger = createLogger('chart-options');
  }
  return rootLogger;
}

/**
 * Initializes the root logger with custom options
 */
export function initLogger(options: CreateLoggerOptions = {}): GeneratorLogger {
  rootLogger = createLogger('chart-options', options);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): GeneratorLogger {
  return getLogger().withContext({ module: moduleName });
}

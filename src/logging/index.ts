/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  getLogger,
  initLogger,
  resetLogger,
  createModuleLogger,
  type LogContext,
  type LoggerConfig,
  type CreateLoggerOptions,
  type GeneratorLogMethods,
  type GeneratorLogger,
} from './logger.js';

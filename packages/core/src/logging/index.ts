/**
 * @fileoverview Logging exports
 */

export {
  Logger,
  LOG_LEVELS,
  getLogger,
  createLogger,
  configureLogging,
  resetLogger,
  isLogLevel,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

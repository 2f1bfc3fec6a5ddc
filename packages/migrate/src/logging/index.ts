/**
 * @fileoverview Logging exports
 */

export {
  MigrationLogger,
  getLogger,
  createLogger,
  resetLogger,
} from './logger.js';

export {
  LOG_LEVELS,
  isLogLevel,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './types.js';

/**
 * Logger Module
 *
 * Centralized logging for the channel sorter.
 */

export {
  Logger,
  createLogger,
  formatError,
  formatPrefix,
  getLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';

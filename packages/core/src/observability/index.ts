export {
  StacklineLogger,
  createLogger,
  formatLogEntry,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type StacklineLoggerConfig,
} from './logger.js';

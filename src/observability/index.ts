/**
 * Observability exports.
 */

export type { Logger, LogContext, LogEntry, LogConfig } from './logging';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  DEFAULT_LOG_CONFIG,
  REDACTED_KEYS,
  createLogger,
} from './logging';

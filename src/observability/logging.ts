/**
 * Structured logging for the Pinata client.
 *
 * The client logs through the `Logger` interface only. `NoopLogger` is the
 * default; `ConsoleLogger` writes one line per entry, as text or as JSON.
 * Context values under credential keys are never written out.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Levels from most to least verbose. */
const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.Debug,
  LogLevel.Info,
  LogLevel.Warn,
  LogLevel.Error,
];

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.Debug]: (line) => console.debug(line),
  [LogLevel.Info]: (line) => console.info(line),
  [LogLevel.Warn]: (line) => console.warn(line),
  [LogLevel.Error]: (line) => console.error(line),
};

/** Context keys whose values are replaced before an entry is written. */
export const REDACTED_KEYS: ReadonlySet<string> = new Set([
  'pinata_api_key',
  'pinata_secret_api_key',
  'secretApiKey',
]);

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  /** Returns a logger that adds `context` to every entry. */
  child(context: LogContext): Logger;
}

export interface LogConfig {
  /** Entries below this level are dropped. */
  level: LogLevel;
  /** Prefix text lines with an ISO timestamp. JSON lines always carry one. */
  timestamps: boolean;
  /** One JSON object per line instead of text. */
  json: boolean;
  /** Context added to every entry. */
  context?: LogContext;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
};

function redact(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = REDACTED_KEYS.has(key) ? '[REDACTED]' : value;
  }
  return result;
}

export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: LogContext;

  constructor(config: Partial<LogConfig> = {}, baseContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = { ...this.config.context, ...baseContext };
  }

  debug(message: string, context?: LogContext): void {
    this.write({ level: LogLevel.Debug, message, timestamp: new Date(), context });
  }

  info(message: string, context?: LogContext): void {
    this.write({ level: LogLevel.Info, message, timestamp: new Date(), context });
  }

  warn(message: string, context?: LogContext): void {
    this.write({ level: LogLevel.Warn, message, timestamp: new Date(), context });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.write({ level: LogLevel.Error, message, timestamp: new Date(), context, error });
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  /**
   * Renders an entry as the single line written to the console. The entry's
   * context is written as given; use the logging methods to merge the
   * logger's own context.
   */
  format(entry: LogEntry): string {
    const context = entry.context ? redact(entry.context) : {};

    if (this.config.json) {
      const record: LogContext = {
        level: entry.level,
        message: entry.message,
        timestamp: entry.timestamp.toISOString(),
        ...context,
      };
      if (entry.error) {
        record['error'] = { name: entry.error.name, message: entry.error.message };
      }
      return JSON.stringify(record);
    }

    const head = this.config.timestamps ? `[${entry.timestamp.toISOString()}] ` : '';
    let line = `${head}[${entry.level.toUpperCase()}] ${entry.message}`;
    if (Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    if (entry.error) {
      line += ` ${entry.error.name}: ${entry.error.message}`;
    }
    return line;
  }

  private write(entry: LogEntry): void {
    if (!this.isEnabled(entry.level)) {
      return;
    }
    const line = this.format({ ...entry, context: { ...this.baseContext, ...entry.context } });
    CONSOLE_WRITERS[entry.level](line);
  }
}

/** Discards everything; the client's default. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

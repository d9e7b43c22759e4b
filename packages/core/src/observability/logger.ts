/**
 * Logging for back stack, navigator and record state activity.
 *
 * Entries carry the record keys and stack sizes involved in a change. A
 * logger is silent unless it has a handler or console output is enabled.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'warn';

/** Fields attached to an entry, such as `key`, `size` or released `keys` */
export type LogContext = Readonly<
  Record<string, string | number | boolean | null | undefined | readonly string[]>
>;

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: LogContext;
}

/** Logger configuration */
export interface StacklineLoggerConfig {
  /** Module name, e.g. `stackline:back-stack` (default: 'stackline') */
  readonly module?: string;
  /** Minimum log level (default: 'warn') */
  readonly level?: LogLevel;
  /** Receives every entry at or above `level` */
  readonly handler?: (entry: LogEntry) => void;
  /** Print entries to the console when no handler is set */
  readonly console?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
};

/**
 * Render an entry as a single line: `[module] message name=value ...`.
 * Undefined fields are left out; lists are comma-joined.
 */
export function formatLogEntry(entry: LogEntry): string {
  const fields: string[] = [];
  for (const [name, value] of Object.entries(entry.context ?? {})) {
    if (value === undefined) continue;
    const rendered = typeof value === 'object' && value !== null ? value.join(',') : String(value);
    fields.push(`${name}=${rendered}`);
  }
  return [`[${entry.module}]`, entry.message, ...fields].join(' ');
}

/**
 * Structured logger for Stackline modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@stackline/core';
 *
 * const log = createLogger({ module: 'app:navigation', level: 'debug', console: true });
 * const stack = createBackStack<Screen>({ logger: log });
 *
 * stack.push({ name: 'home' }); // [app:navigation] push key=... size=1
 * ```
 */
export class StacklineLogger {
  /** Module name this logger writes under */
  readonly module: string;

  private readonly level: LogLevel;
  private readonly handler?: (entry: LogEntry) => void;
  private readonly toConsole: boolean;

  constructor(config: StacklineLoggerConfig = {}) {
    this.module = config.module ?? 'stackline';
    this.level = config.level ?? 'warn';
    this.handler = config.handler;
    this.toConsole = config.console ?? false;
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Start a timer. The returned function logs `${operation} completed` at
   * debug level with `durationMs` added to its context.
   */
  time(operation: string): (context?: LogContext) => void {
    const start = performance.now();
    return (context?: LogContext) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;
    if (!this.handler && !this.toConsole) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    const consoleFn = level === 'warn' ? console.warn : console.debug;
    consoleFn(formatLogEntry(entry));
  }
}

/** Factory function to create a StacklineLogger */
export function createLogger(config?: StacklineLoggerConfig): StacklineLogger {
  return new StacklineLogger(config);
}

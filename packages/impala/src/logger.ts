/**
 * @lakehouse/impala - Logging
 *
 * Leveled logger with injectable sinks. Diagnostics about failed RPCs and
 * retries go through logException(), which stamps them with local time.
 */

import { describeError } from './errors.js';

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'warn'
   */
  level?: LogLevel;

  /**
   * Output function for debug and info messages.
   * @default console.log
   */
  stdout?: (message: string) => void;

  /**
   * Output function for warnings and errors.
   * @default console.error
   */
  stderr?: (message: string) => void;

  /** Clock used for timestamps */
  now?: () => Date;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Logger {
  private level: LogLevel;
  private stdout: (message: string) => void;
  private stderr: (message: string) => void;
  private now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn';
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
    this.now = options.now ?? (() => new Date());
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stdout(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(message);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`Error: ${message}`);
    }
  }

  /**
   * Log an error with a timestamp and a category, e.g.
   * `2024-01-02 03:04:05 [Exception] type=TransportError in GetLog. Num remaining tries: 2 TransportError: reset`
   *
   * Category "Warning" logs at warn level, everything else at error level.
   */
  logException(category: string, message: string, error: unknown): void {
    const level: LogLevel = category === 'Warning' ? 'warn' : 'error';
    if (this.shouldLog(level)) {
      this.stderr(`${formatTimestamp(this.now())} [${category}] ${message} ${describeError(error)}`);
    }
  }
}

/**
 * Creates a new logger instance with custom options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * LSYS — Logger
 *
 * Leveled console logging for the command line. The library itself never
 * logs: it returns warnings as data and leaves reporting to the caller.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.warn('Letter has no rule', { letter: 'B' });
 */

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/** Higher = more verbose */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Append the context as JSON, if there is any.
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${JSON.stringify(context)}`;
}

/**
 * Writes to the console; calls below the configured level are no-ops.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(public readonly level: LogLevel = 'warnings') {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  private enabled(level: LogLevel): boolean {
    return this.priority >= LOG_LEVEL_PRIORITY[level];
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('errors')) return;
    console.error(formatMessage(`[ERROR] ${message}`, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('warnings')) return;
    console.warn(formatMessage(`[WARN] ${message}`, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    console.info(formatMessage(`[INFO] ${message}`, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.debug(formatMessage(`[DEBUG] ${message}`, context));
  }
}

export function createLogger(level: LogLevel = 'warnings'): Logger {
  return new ConsoleLogger(level);
}

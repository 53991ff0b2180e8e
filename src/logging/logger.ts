/**
 * Logging for the metric batch registry.
 *
 * Any object with the four level methods can be passed in; pino, winston
 * and console all fit.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log warning message */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log error message */
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Create a console logger with the specified minimum level
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug', '[metrics]');
 * logger.info('Registry started'); // 2026-01-21T12:00:00.000Z INFO  [metrics] Registry started
 * ```
 */
export function createConsoleLogger(
  minLevel: LogLevel = 'info',
  prefix = '[metric-batch-registry]'
): Logger {
  const threshold = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;
    const args: unknown[] = context && Object.keys(context).length > 0 ? [line, context] : [line];

    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

/**
 * No-op logger for silent operation
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

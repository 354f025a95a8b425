/**
 * Logger utility for @toolbelt/runtime
 *
 * Lightweight, dependency-free logging with configurable levels. Output goes
 * through a console-shaped sink so the MCP server can route everything to
 * stderr while stdout carries the protocol.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Private - not exported from module
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

/** The subset of `Console` a logger writes to. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Create a logger instance with the specified minimum level
 *
 * @param minLevel - Minimum log level to output (default: 'info')
 * @param prefix - Prefix for log messages (default: '[toolbelt]')
 * @param sink - Where formatted lines go (default: the global console)
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[catalog]');
 * logger.info('probe finished'); // 2026-01-21T12:00:00.000Z INFO  [catalog] probe finished
 * ```
 */
export function createLogger(
  minLevel: LogLevel = 'info',
  prefix = '[toolbelt]',
  sink: LogSink = console,
): Logger {
  let currentLevel = LOG_LEVELS[minLevel];

  const log = (level: LogLevel, message: string, ...args: unknown[]) => {
    if (LOG_LEVELS[level] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      const fullMessage = `${timestamp} ${levelStr} ${prefix} ${message}`;

      switch (level) {
        case 'debug':
          sink.debug(fullMessage, ...args);
          break;
        case 'info':
          sink.info(fullMessage, ...args);
          break;
        case 'warn':
          sink.warn(fullMessage, ...args);
          break;
        case 'error':
          sink.error(fullMessage, ...args);
          break;
      }
    }
  };

  return {
    debug: (message, ...args) => log('debug', message, ...args),
    info: (message, ...args) => log('info', message, ...args),
    warn: (message, ...args) => log('warn', message, ...args),
    error: (message, ...args) => log('error', message, ...args),
    setLevel: (level) => {
      currentLevel = LOG_LEVELS[level];
    },
  };
}

/**
 * No-op logger. Every component that accepts an optional logger falls back
 * to this one.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  setLevel: () => {},
};

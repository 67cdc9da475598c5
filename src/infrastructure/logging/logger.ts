/**
 * @solo-inject/core - Logger
 *
 * Minimal leveled logger used by the resolver.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, lowest first. `silent` suppresses everything.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

const noop = (): void => undefined;

/**
 * Logger that discards every message
 */
export const silentLogger: ILogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Wrap a logger so that messages below `level` are dropped.
 *
 * @example
 * ```typescript
 * const logger = withMinimumLevel(consoleLogger, 'warn');
 * logger.debug('dropped');
 * logger.warn('printed');
 * ```
 */
export function withMinimumLevel(logger: ILogger, level: LogLevel): ILogger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: enabled('debug') ? (message, ...args) => logger.debug(message, ...args) : noop,
    info: enabled('info') ? (message, ...args) => logger.info(message, ...args) : noop,
    warn: enabled('warn') ? (message, ...args) => logger.warn(message, ...args) : noop,
    error: enabled('error') ? (message, ...args) => logger.error(message, ...args) : noop,
  };
}

/**
 * Prefix every message with a component name
 */
export function withPrefix(logger: ILogger, prefix: string): ILogger {
  return {
    debug: (message, ...args) => logger.debug(`[${prefix}] ${message}`, ...args),
    info: (message, ...args) => logger.info(`[${prefix}] ${message}`, ...args),
    warn: (message, ...args) => logger.warn(`[${prefix}] ${message}`, ...args),
    error: (message, ...args) => logger.error(`[${prefix}] ${message}`, ...args),
  };
}

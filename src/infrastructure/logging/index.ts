/**
 * @solo-inject/core - Logging Module
 */

export {
  consoleLogger,
  silentLogger,
  withMinimumLevel,
  withPrefix,
  isLogLevel,
  LOG_LEVELS,
} from './logger';

export type { ILogger, LogLevel } from './logger';

/**
 * @solo-inject/core - Injection Configuration
 *
 * Settings for the process-wide default injector, read from the environment.
 */

import { LogLevel, isLogLevel } from '../logging/logger';

/**
 * Environment-derived configuration
 */
export interface InjectionConfig {
  /** Name used as the log prefix */
  name: string;

  /** Lowest level that reaches the logger */
  logLevel: LogLevel;
}

export const DEFAULT_INJECTION_CONFIG: Readonly<InjectionConfig> = {
  name: 'solo-inject',
  logLevel: 'warn',
};

/**
 * Read `INJECTION_NAME` and `INJECTION_LOG_LEVEL`.
 * Missing or unknown values fall back to the defaults.
 *
 * @example
 * ```typescript
 * loadInjectionConfig({ INJECTION_LOG_LEVEL: 'debug' });
 * // { name: 'solo-inject', logLevel: 'debug' }
 * ```
 */
export function loadInjectionConfig(env: NodeJS.ProcessEnv = process.env): InjectionConfig {
  const level = env.INJECTION_LOG_LEVEL?.trim().toLowerCase();
  const name = env.INJECTION_NAME?.trim();

  return {
    name: name ? name : DEFAULT_INJECTION_CONFIG.name,
    logLevel: level && isLogLevel(level) ? level : DEFAULT_INJECTION_CONFIG.logLevel,
  };
}

/**
 * @solo-inject/core - Configuration Module
 */

export { loadInjectionConfig, DEFAULT_INJECTION_CONFIG } from './InjectionConfig';

export type { InjectionConfig } from './InjectionConfig';

/**
 * @fileoverview Unit tests for environment configuration
 */

import { DEFAULT_INJECTION_CONFIG, loadInjectionConfig } from '../../../src';

describe('loadInjectionConfig', () => {
  it('should fall back to the defaults on an empty environment', () => {
    expect(loadInjectionConfig({})).toEqual({ name: 'solo-inject', logLevel: 'warn' });
    expect(loadInjectionConfig({})).toEqual(DEFAULT_INJECTION_CONFIG);
  });

  it('should read the name and log level', () => {
    expect(
      loadInjectionConfig({ INJECTION_NAME: 'billing', INJECTION_LOG_LEVEL: 'debug' }),
    ).toEqual({ name: 'billing', logLevel: 'debug' });
  });

  it('should normalize case and whitespace of the level', () => {
    expect(loadInjectionConfig({ INJECTION_LOG_LEVEL: '  Error ' }).logLevel).toBe('error');
  });

  it('should ignore an unknown level', () => {
    expect(loadInjectionConfig({ INJECTION_LOG_LEVEL: 'verbose' }).logLevel).toBe('warn');
  });

  it('should ignore a blank name', () => {
    expect(loadInjectionConfig({ INJECTION_NAME: '   ' }).name).toBe('solo-inject');
  });
});

/**
 * @fileoverview Unit tests for logger wrappers
 */

import { ILogger, withMinimumLevel, withPrefix, isLogLevel, silentLogger } from '../../../src';

function createSpyLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('withMinimumLevel', () => {
  it('should drop messages below the threshold', () => {
    const target = createSpyLogger();
    const logger = withMinimumLevel(target, 'warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(target.debug).not.toHaveBeenCalled();
    expect(target.info).not.toHaveBeenCalled();
    expect(target.warn).toHaveBeenCalledWith('w');
    expect(target.error).toHaveBeenCalledWith('e');
  });

  it('should forward extra arguments', () => {
    const target = createSpyLogger();
    withMinimumLevel(target, 'debug').debug('built', 3, { ok: true });

    expect(target.debug).toHaveBeenCalledWith('built', 3, { ok: true });
  });

  it('should drop everything when silent', () => {
    const target = createSpyLogger();
    const logger = withMinimumLevel(target, 'silent');

    logger.error('e');

    expect(target.error).not.toHaveBeenCalled();
  });
});

describe('withPrefix', () => {
  it('should prefix every level', () => {
    const target = createSpyLogger();
    const logger = withPrefix(target, 'app');

    logger.info('ready');
    logger.error('failed', 1);

    expect(target.info).toHaveBeenCalledWith('[app] ready');
    expect(target.error).toHaveBeenCalledWith('[app] failed', 1);
  });
});

describe('isLogLevel', () => {
  it.each(['debug', 'info', 'warn', 'error', 'silent'])('should accept %s', (level) => {
    expect(isLogLevel(level)).toBe(true);
  });

  it('should reject unknown levels', () => {
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('WARN')).toBe(false);
  });
});

describe('silentLogger', () => {
  it('should discard messages', () => {
    expect(() => silentLogger.error('ignored')).not.toThrow();
  });
});

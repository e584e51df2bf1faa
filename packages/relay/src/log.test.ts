import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConsoleLogger, resolveLogLevel } from './log.js';

describe('resolveLogLevel', () => {
  it('should accept a level in any case', () => {
    expect(resolveLogLevel({ RELAY_LOG_LEVEL: 'WARN' })).toBe('warn');
  });

  it('should fall back to debug when DEBUG is set', () => {
    expect(resolveLogLevel({ DEBUG: '1' })).toBe('debug');
    expect(resolveLogLevel({ RELAY_LOG_LEVEL: 'loud', DEBUG: '1' })).toBe('debug');
  });

  it('should default to info and ignore inherited property names', () => {
    expect(resolveLogLevel({})).toBe('info');
    expect(resolveLogLevel({ RELAY_LOG_LEVEL: 'constructor' })).toBe('info');
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should suppress messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger('warn');

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0].slice(1)).toEqual(['[WARN]', 'shown']);
  });
});

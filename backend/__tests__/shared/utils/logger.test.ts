import { describe, it, expect, vi, afterEach } from 'vitest';
import { isLogLevel, Logger } from '../../../src/shared/utils/logger.js';

describe('isLogLevel', () => {
  it('accepts the known levels', () => {
    expect(['debug', 'info', 'warn', 'error', 'silent'].every((level) => isLogLevel(level))).toBe(true);
  });

  it('rejects unknown values and inherited object keys', () => {
    expect(isLogLevel(undefined)).toBe(false);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const log = new Logger({ level: 'warn' });
    log.info('hidden');
    log.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[1]).toBe('shown');
  });

  it('prefixes child loggers with their context', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger({ level: 'error', context: 'api' }).child('feed').error('failed');

    expect(String(error.mock.calls[0]?.[0])).toMatch(/\[error\] \(api:feed\)$/);
  });
});

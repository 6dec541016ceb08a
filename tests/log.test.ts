import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, getLogLevel, setLogLevel } from '@/lib/log';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('warn');
    vi.restoreAllMocks();
  });

  it('defaults to warn', () => {
    expect(getLogLevel()).toBe('warn');
  });

  it('prefixes messages with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('test').warn('hello', 1);
    expect(warn).toHaveBeenCalledWith('[test]', 'hello', 1);
  });

  it('drops messages below the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = createLogger('test');
    log.info('hidden');
    setLogLevel('info');
    log.info('shown');
    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('[test]', 'shown');
  });

  it('is quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');
    createLogger('test').error('boom');
    expect(error).not.toHaveBeenCalled();
  });
});

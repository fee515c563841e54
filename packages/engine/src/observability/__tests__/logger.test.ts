import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, resolveLogLevel } from '../logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('tags output with its scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger('trust-dynamics', 'debug').warn('Trust dropped', { score: 49 });

    expect(warn).toHaveBeenCalledWith('[trust-dynamics]', 'Trust dropped', { score: 49 });
  });

  it('drops messages below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('queue', 'warn');

    logger.debug('hidden');
    logger.error('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[queue]', 'shown');
  });

  it('stays quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger('queue', 'silent').error('never');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('resolveLogLevel', () => {
  it('normalises known levels and falls back otherwise', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('verbose', 'warn')).toBe('warn');
    expect(resolveLogLevel('toString')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});

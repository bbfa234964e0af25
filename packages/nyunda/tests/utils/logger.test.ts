import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('warn');
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[nyunda] shown');
  });

  it('should append context as JSON', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('debug').info('Parsed program', { statements: 2 });
    expect(info).toHaveBeenCalledWith('[nyunda] Parsed program {"statements":2}');
  });

  it('should print the error after the message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('boom');

    createLogger().error('Failed to parse config', { path: 'a.yaml' }, cause);
    expect(error).toHaveBeenNthCalledWith(1, '[nyunda] Failed to parse config {"path":"a.yaml"}');
    expect(error).toHaveBeenNthCalledWith(2, cause);
  });

  it('should stay quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error('nothing');
    expect(error).not.toHaveBeenCalled();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

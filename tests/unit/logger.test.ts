import { describe, it, expect, vi, afterEach } from 'vitest';
import * as log from '../../src/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    log.setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('should write every level to stderr, never stdout', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    log.setLogLevel('debug');

    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e');

    expect(stderr).toHaveBeenCalledTimes(4);
    expect(stdout).not.toHaveBeenCalled();
  });

  it('should drop messages below the current level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    log.setLogLevel('warn');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(log.getLogLevel()).toBe('warn');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('[WARN] shown');
  });
});

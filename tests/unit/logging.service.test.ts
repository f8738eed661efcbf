import { afterEach, describe, expect, it, vi } from 'vitest';
import Log from '../../models/Log';
import { loggingService } from '../../services/logging.service';
import { logger } from '../../utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loggingService', () => {
  it('exposes only the request-level warn and error entry points', () => {
    expect(typeof loggingService.warn).toBe('function');
    expect(typeof loggingService.error).toBe('function');
    expect('info' in loggingService).toBe(false);
    expect('success' in loggingService).toBe(false);
  });

  it('writes request warnings and errors to the console logger', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const failure = new Error('boom');

    loggingService.warn('Client error: bad input');
    loggingService.error('Server error: unexpected', undefined, failure);

    expect(warn).toHaveBeenCalledWith('Client error: bad input');
    expect(error).toHaveBeenCalledWith('Server error: unexpected', failure);
  });

  it('prefixes scoped warnings with the error message', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(logger, 'info').mockImplementation(() => {});
    const drift = loggingService.scope('drift');

    drift.info('Comparing 30 current rows against 30 reference rows');
    drift.warn('Taking over stale drift lock', new Error('pid 42 is gone'));
    drift.warn('Queue full');

    expect(info).toHaveBeenCalledWith('Comparing 30 current rows against 30 reference rows');
    expect(warn.mock.calls).toEqual([['Taking over stale drift lock: pid 42 is gone'], ['Queue full']]);
  });

  it('keeps log persistence off when disabled by configuration', () => {
    vi.spyOn(logger, 'error').mockImplementation(() => {});
    const create = vi.spyOn(Log, 'create');

    loggingService.scope('recorder').error('Decision not recorded', new Error('connection reset'));

    expect(create).not.toHaveBeenCalled();
  });
});

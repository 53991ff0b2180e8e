import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger } from '../logger.js';

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger('info', '[test]');

    logger.debug('hidden');
    logger.warn('shown', { meter: 'requests' });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/^\S+ WARN  \[test\] shown$/);
    expect(warn.mock.calls[0]?.[1]).toEqual({ meter: 'requests' });
  });
});

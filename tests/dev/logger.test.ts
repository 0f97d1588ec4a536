import { describe, it, expect, vi, beforeEach } from 'vitest';
import { logger } from '../../src/dev/logger';
import { warnOnce } from '../../src/dev/warnings';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should prefix every line', () => {
    logger.warn('slow frame', 42);
    expect(console.warn).toHaveBeenCalledWith('[boxwood]', 'slow frame', 42);
  });

  it('should stay quiet in production except for errors', () => {
    process.env.NODE_ENV = 'production';
    logger.warn('hidden');
    logger.error('shown');

    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('[boxwood]', 'shown');
  });
});

describe('warnOnce', () => {
  it('should warn once per key', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    warnOnce('k', 'first');
    warnOnce('k', 'second');
    warnOnce('other', 'third');

    expect(warn.mock.calls).toEqual([
      ['[boxwood]', 'first'],
      ['[boxwood]', 'third'],
    ]);
  });
});

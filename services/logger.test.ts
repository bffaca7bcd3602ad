import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes tagged lines to stderr at or above the threshold', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = createLogger('provider');

    log.debug('hidden');
    log.info('Fetching AAPL');
    log.warn('Retrying', { attempt: 1 });

    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO \[provider\] Fetching AAPL$/);
    expect(spy.mock.calls[1][1]).toEqual({ attempt: 1 });
  });

  it('goes quiet when silenced', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');
    expect(getLogLevel()).toBe('silent');

    createLogger('cache').error('nothing to see');
    expect(spy).not.toHaveBeenCalled();
  });
});

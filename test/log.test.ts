import { afterEach, describe, expect, it, vi } from 'vitest';
import { logError, logInfo, logSuccess, logWarning } from '../src/log';

describe('log', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends info and success to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    logInfo('scanning');
    logSuccess('done');

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0][0]).toContain('scanning');
    expect(log.mock.calls[1][0]).toContain('done');
  });

  it('sends warnings and errors to stderr', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logWarning('skipped');
    logError('failed');

    expect(warn.mock.calls[0][0]).toContain('skipped');
    expect(error.mock.calls[0][0]).toContain('failed');
  });
});

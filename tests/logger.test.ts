import { describe, it, expect, vi, afterEach } from 'vitest';
import { log, warn, error, debug, setSilentMode, setVerboseMode, isSilentMode, isVerboseMode } from '../src/output/logger';

describe('logger', () => {
  afterEach(() => {
    setSilentMode(false);
    setVerboseMode(false);
    vi.restoreAllMocks();
  });

  it('silences log and warn but never error', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    setSilentMode(true);
    log('hidden');
    warn('hidden');
    error('shown');

    expect(isSilentMode()).toBe(true);
    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('shown');
  });

  it('prints debug output only in verbose mode', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    debug('quiet');
    setVerboseMode(true);
    debug('loud', 2);

    expect(isVerboseMode()).toBe(true);
    expect(errorSpy.mock.calls).toEqual([['[message-director]', 'loud', 2]]);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { type LogEntry, debug, onLog, setLogLevel, warn } from '../logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('prefixes messages and appends data as JSON', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('info');
    warn('scaler missing', { path: 'scaler.json' });
    expect(spy).toHaveBeenCalledWith('[textprobe] scaler missing {"path":"scaler.json"}');
  });

  it('filters below the current level and notifies callbacks', () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    const entries: LogEntry[] = [];
    const unsubscribe = onLog((entry) => entries.push(entry));
    debug('hidden');
    warn('shown');
    unsubscribe();
    warn('after unsubscribe');

    expect(entries.map((e) => [e.level, e.message])).toEqual([['warn', 'shown']]);
    expect(console.debug).not.toHaveBeenCalled();
  });

  it('writes debug lines only at debug level', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('debug');
    debug('loaded vocabulary', { entries: 2 });
    setLogLevel('error');
    warn('suppressed');
    debug('suppressed');
    expect(spy.mock.calls).toEqual([['[textprobe] loaded vocabulary {"entries":2}']]);
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, logDebug, logError, logInfo, logWarning, setLogLevel } from '../logger.js';

afterEach(() => {
  setLogLevel(null);
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs prefixed message only for ${level} when context is undefined`, () => {
      setLogLevel('debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('[concord] hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      setLogLevel('debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('[concord] hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      setLogLevel('debug');
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { sessionId: 'sess-123' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('[concord] hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    setLogLevel('warn');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('quiet');
    logDebug('quieter');
    logWarning('loud');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('silent suppresses every level', () => {
    setLogLevel('silent');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('nope');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('reads CONCORD_LOG_LEVEL when no level is pinned', () => {
    const previous = process.env.CONCORD_LOG_LEVEL;
    process.env.CONCORD_LOG_LEVEL = 'ERROR';
    try {
      expect(getLogLevel()).toBe('error');
      process.env.CONCORD_LOG_LEVEL = 'verbose';
      expect(getLogLevel()).toBe('info');
    } finally {
      if (previous === undefined) delete process.env.CONCORD_LOG_LEVEL;
      else process.env.CONCORD_LOG_LEVEL = previous;
    }
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  getLogLevel,
  isLogLevel,
  logAssertion,
  logDebug,
  logError,
  logInfo,
  logWarning,
  setLogLevel,
  type LogLevel,
} from '../logger.js';

let previousLevel: LogLevel;

beforeEach(() => {
  previousLevel = getLogLevel();
  setLogLevel('debug');
});

afterEach(() => {
  setLogLevel(previousLevel);
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
    it(`logs message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { moduleName: 'os.path' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('prefixes assertion diagnostics', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logAssertion('lock never released', { timeoutMs: 20 });

    expect(spy).toHaveBeenCalledWith('[assertion] lock never released', { timeoutMs: 20 });
  });

  it('drops messages below the threshold', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('warn');

    logDebug('debug');
    logInfo('info');
    logWarning('warn');
    logError('error');

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('error');
  });

  it('silences everything at the silent level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('silent');

    logError('error');
    logAssertion('assertion');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

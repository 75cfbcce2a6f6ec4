import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { configureLogger, getLogLevel, isLogLevel, logDebug, logError, logInfo, logWarning } from '../logger.js';

beforeEach(() => {
  configureLogger({ level: 'debug' });
});

afterEach(() => {
  configureLogger({ level: 'silent' });
  vi.unstubAllEnvs();
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

      expect(spy).toHaveBeenCalledWith('[advisor] hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('[advisor] hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { session: 'session-1' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('[advisor] hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    configureLogger({ level: 'warn' });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('quiet');
    logDebug('quiet');
    logWarning('loud');

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[advisor] loud');
  });

  it('drops everything when silent', () => {
    configureLogger({ level: 'silent' });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('nothing');

    expect(error).not.toHaveBeenCalled();
  });

  it('falls back to ADVISOR_LOG_LEVEL, then info', () => {
    configureLogger({ level: null });

    vi.stubEnv('ADVISOR_LOG_LEVEL', ' ERROR ');
    expect(getLogLevel()).toBe('error');

    vi.stubEnv('ADVISOR_LOG_LEVEL', 'chatty');
    expect(getLogLevel()).toBe('info');
  });

  it('recognizes log level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

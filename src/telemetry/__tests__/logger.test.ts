import { afterEach, describe, expect, it, vi } from 'vitest';
import { createStageLogger, logDebug, logError, logInfo, logWarning } from '../logger.js';

afterEach(() => {
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
    it(`writes only the message for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('round complete', {});

      expect(spy).toHaveBeenCalledWith('round complete');
    });

    it(`writes message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { round: 3 };

      fn('round complete', context);

      expect(spy).toHaveBeenCalledWith('round complete', context);
    });
  }
});

describe('createStageLogger', () => {
  it('drops info and debug output when not verbose', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createStageLogger('orientation', false);

    logger.info('bootstrap pass');
    logger.debug('pair evaluated');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(logger.verbose).toBe(false);
  });

  it('prefixes diagnostics with the stage when verbose', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createStageLogger('two-cycle', true);

    logger.info('pair confirmed', { pair: 'X,Y' });

    expect(errorSpy).toHaveBeenCalledWith('[skewcycle:two-cycle] pair confirmed', { pair: 'X,Y' });
  });

  it('always emits warnings', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createStageLogger('orientation', false);

    logger.warn('singular design');

    expect(warnSpy).toHaveBeenCalledWith('[skewcycle:orientation] singular design');
  });
});

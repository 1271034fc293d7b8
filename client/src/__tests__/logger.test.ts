import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, logLevelFromEnv, setLogLevel } from '../core/logger';

describe('Logger', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    setLogLevel('info');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('filters logs below the global level', () => {
    const logger = createLogger('test');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    setLogLevel('warn');
    logger.debug('nope');
    logger.warn('yeah');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[test]', 'yeah');
  });

  it('attaches category prefix to all outputs', () => {
    const logger = createLogger('Scene:main');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    logger.info('payload', 3);

    expect(info).toHaveBeenCalledWith('[Scene:main]', 'payload', 3);
  });

  it('respects level changes at runtime', () => {
    const logger = createLogger('rt');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    setLogLevel('error');
    logger.info('hidden');
    logger.error('visible');

    expect(getLogLevel()).toBe('error');
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[rt]', 'visible');
  });

  it('reads the level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    expect(logLevelFromEnv()).toBe('debug');
  });

  it('falls back when LOG_LEVEL is not a level', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(logLevelFromEnv('warn')).toBe('warn');
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, initializeLogger } from '../../../src/lib/logger/Logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    debug: ReturnType<typeof vi.spyOn>;
    info: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    logger = new Logger('TestContext');
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
    Logger.setDebugMode(false);
    consoleSpy.log.mockClear();
  });

  afterEach(() => {
    Logger.setDebugMode(false);
    window.localStorage.clear();
    vi.restoreAllMocks();
  });

  it('prefixes messages with the widget name and context', () => {
    logger.info('hello', 1);
    expect(consoleSpy.info).toHaveBeenCalledWith('[OptionSync:TestContext]', 'hello', 1);
  });

  it('hides debug and warn output unless debug mode is on', () => {
    logger.debug('a');
    logger.warn('c');
    expect(consoleSpy.debug).not.toHaveBeenCalled();
    expect(consoleSpy.warn).not.toHaveBeenCalled();

    Logger.setDebugMode(true);
    logger.debug('a');
    logger.warn('c');
    expect(consoleSpy.debug).toHaveBeenCalledWith('[OptionSync:TestContext]', 'a');
    expect(consoleSpy.warn).toHaveBeenCalledWith('[OptionSync:TestContext]', 'c');
  });

  it('always prints errors with their stack trace', () => {
    const error = new Error('boom');
    logger.error('failed', error);

    expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    expect(consoleSpy.error.mock.calls[0]).toEqual(['[OptionSync:TestContext]', 'failed', error]);
    expect(consoleSpy.error.mock.calls[1][0]).toBe('Stack trace:');
  });

  it('marks important messages', () => {
    logger.important('ready');
    expect(consoleSpy.log).toHaveBeenCalledWith('[OptionSync:TestContext] IMPORTANT:', 'ready');
  });

  describe('initializeLogger()', () => {
    it('enables debug mode from configuration', () => {
      initializeLogger(true);
      logger.debug('visible');
      expect(consoleSpy.debug).toHaveBeenCalledWith('[OptionSync:TestContext]', 'visible');
    });

    it('enables debug mode from localStorage', () => {
      window.localStorage.setItem('optionsync:debug', 'true');
      initializeLogger(false);
      logger.debug('visible');
      expect(consoleSpy.debug).toHaveBeenCalledWith('[OptionSync:TestContext]', 'visible');
    });

    it('stays quiet by default', () => {
      initializeLogger();
      logger.debug('hidden');
      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.log).toHaveBeenCalledWith('[OptionSync] Debug logging disabled');
    });
  });
});

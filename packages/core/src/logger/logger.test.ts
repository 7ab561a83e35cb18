import { ConsoleLogger, createLogger, isLogLevel, resolveLogLevel } from './logger';

describe('Logger', () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ConsoleLogger', () => {
    it('should prefix messages and pass extra arguments through', () => {
      const logger = new ConsoleLogger('[Test] ', 'debug');

      logger.info('imported', 3);

      expect(logSpy).toHaveBeenCalledWith('[Test] imported', 3);
    });

    it('should drop messages below the configured level', () => {
      const logger = new ConsoleLogger('', 'warn');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).toHaveBeenCalledWith('w');
      expect(errorSpy).toHaveBeenCalledWith('e');
    });

    it('should log nothing when silent', () => {
      const logger = new ConsoleLogger('', 'silent');

      logger.error('boom');

      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should allow changing the level at runtime', () => {
      const logger = new ConsoleLogger('', 'error');
      logger.setLevel('debug');

      logger.debug('now visible');

      expect(logger.getLevel()).toBe('debug');
      expect(logSpy).toHaveBeenCalledWith('now visible');
    });
  });

  describe('resolveLogLevel', () => {
    it('should be silent under test', () => {
      expect(resolveLogLevel({ NODE_ENV: 'test', TASKTALLY_LOG_LEVEL: 'debug' })).toBe('silent');
    });

    it('should honour TASKTALLY_LOG_LEVEL when valid', () => {
      expect(resolveLogLevel({ TASKTALLY_LOG_LEVEL: 'warn' })).toBe('warn');
      expect(resolveLogLevel({ TASKTALLY_LOG_LEVEL: 'verbose' })).toBe('info');
      expect(resolveLogLevel({})).toBe('info');
    });
  });

  describe('createLogger', () => {
    it('should prefer an explicit level', () => {
      expect(createLogger('[X] ', 'error').getLevel()).toBe('error');
    });

    it('should default to silent inside jest', () => {
      expect(createLogger('[X] ').getLevel()).toBe('silent');
    });
  });

  it('should recognise log level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

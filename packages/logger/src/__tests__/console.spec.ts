import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, createLogger } from '../console';
import { LogLevel } from '../types';

describe('ConsoleLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'trace').mockImplementation(() => {});

    // Mock Date.now for predictable timestamps
    vi.spyOn(Date, 'now').mockReturnValue(1234567890);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create logger with no initial context', () => {
    const logger = new ConsoleLogger();

    expect(logger.data).toEqual({});
    expect(logger.level).toBe(LogLevel.Trace);
  });

  it('should log structured message with context', () => {
    const logger = new ConsoleLogger({ app: 'test' });

    logger.info({ route: '/todos' }, 'Route registered');

    expect(console.info).toHaveBeenCalledWith(
      { app: 'test', route: '/todos', ts: 1234567890 },
      'Route registered',
    );
  });

  it('should log only the context object when no message is given', () => {
    const logger = new ConsoleLogger();

    logger.debug({ action: 'test' });

    expect(console.debug).toHaveBeenCalledWith({
      action: 'test',
      ts: 1234567890,
    });
  });

  it('should log plain strings with context', () => {
    const logger = new ConsoleLogger({ app: 'test' });

    logger.warn('Careful');

    expect(console.warn).toHaveBeenCalledWith(
      { app: 'test', ts: 1234567890 },
      'Careful',
    );
  });

  it('should route fatal to console.error', () => {
    const logger = new ConsoleLogger();

    logger.fatal('Going down');

    expect(console.error).toHaveBeenCalledWith({ ts: 1234567890 }, 'Going down');
  });

  it('should drop messages below the configured level', () => {
    const logger = new ConsoleLogger({}, LogLevel.Warn);

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(console.debug).not.toHaveBeenCalled();
    expect(console.info).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith({ ts: 1234567890 }, 'shown');
  });

  describe('child', () => {
    it('should merge parent and child context', () => {
      const parent = new ConsoleLogger({ app: 'myApp' });
      const child = parent.child({ module: 'auth' });

      child.info({ userId: 123 }, 'Authenticated');

      expect(console.info).toHaveBeenCalledWith(
        { app: 'myApp', module: 'auth', userId: 123, ts: 1234567890 },
        'Authenticated',
      );
    });

    it('should keep the parent level', () => {
      const child = new ConsoleLogger({}, LogLevel.Error).child({ a: 1 });

      child.info('hidden');

      expect(console.info).not.toHaveBeenCalled();
    });
  });

  describe('createLogger', () => {
    it('should default to info level', () => {
      const logger = createLogger();

      logger.debug('hidden');
      logger.info('shown');

      expect(console.debug).not.toHaveBeenCalled();
      expect(console.info).toHaveBeenCalledWith({ ts: 1234567890 }, 'shown');
    });

    it('should honour the level option', () => {
      const logger = createLogger({ level: LogLevel.Debug });

      logger.debug('shown');

      expect(console.debug).toHaveBeenCalledWith({ ts: 1234567890 }, 'shown');
    });

    it('should bind the service name', () => {
      const logger = createLogger({ name: 'todo-api' });

      logger.info('shown');

      expect(console.info).toHaveBeenCalledWith(
        { name: 'todo-api', ts: 1234567890 },
        'shown',
      );
    });
  });
});

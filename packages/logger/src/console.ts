import { type CreateLoggerOptions, type LogFn, LogLevel, type Logger } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.Trace]: 10,
  [LogLevel.Debug]: 20,
  [LogLevel.Info]: 30,
  [LogLevel.Warn]: 40,
  [LogLevel.Error]: 50,
  [LogLevel.Fatal]: 60,
  [LogLevel.Silent]: Number.POSITIVE_INFINITY,
};

/**
 * Console-based logger implementation that outputs to standard console methods.
 * Supports structured logging with automatic timestamp injection and context inheritance.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ app: 'todo-api' });
 * logger.info({ route: '/todos' }, 'Route registered');
 * // Output: { app: 'todo-api', route: '/todos', ts: 1234567890 } Route registered
 * ```
 */
export class ConsoleLogger implements Logger {
  /**
   * @param data - Initial context data to include in all log messages
   * @param level - Minimum level written; lower levels are dropped
   */
  constructor(
    readonly data: object = {},
    readonly level: LogLevel = LogLevel.Trace,
  ) {}

  /**
   * Creates a logging function that merges context data and adds timestamps.
   */
  private createLogFn(
    level: LogLevel,
    logMethod: (...args: unknown[]) => void,
  ): LogFn {
    return <T extends object>(
      objOrMsg: T | string,
      msg?: string,
      ...args: unknown[]
    ): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
        return;
      }

      const ts = Date.now();

      // Handle simple string logging: logger.info('message')
      if (typeof objOrMsg === 'string') {
        logMethod({ ...this.data, ts }, objOrMsg, ...args);
        return;
      }

      // Handle structured logging: logger.info({ data }, 'message')
      const mergedData = { ...this.data, ...objOrMsg, ts };
      if (msg) {
        logMethod(mergedData, msg, ...args);
      } else {
        logMethod(mergedData, ...args);
      }
    };
  }

  debug: LogFn = this.createLogFn(LogLevel.Debug, (...args) =>
    console.debug(...args),
  );
  info: LogFn = this.createLogFn(LogLevel.Info, (...args) =>
    console.info(...args),
  );
  warn: LogFn = this.createLogFn(LogLevel.Warn, (...args) =>
    console.warn(...args),
  );
  error: LogFn = this.createLogFn(LogLevel.Error, (...args) =>
    console.error(...args),
  );
  /** Fatal level logging function (uses console.error) */
  fatal: LogFn = this.createLogFn(LogLevel.Fatal, (...args) =>
    console.error(...args),
  );
  trace: LogFn = this.createLogFn(LogLevel.Trace, (...args) =>
    console.trace(...args),
  );

  /**
   * Creates a child logger with additional context data.
   * The child keeps the parent's level.
   *
   * @example
   * ```typescript
   * const parentLogger = new ConsoleLogger({ app: 'todo-api' });
   * const childLogger = parentLogger.child({ route: '/todos/:id' });
   * ```
   */
  child(obj: object): Logger {
    return new ConsoleLogger(
      {
        ...this.data,
        ...obj,
      },
      this.level,
    );
  }
}

export const DEFAULT_LOGGER: Logger = new ConsoleLogger();

/**
 * Creates a console logger with the same API as the pino `createLogger`.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@shapekit/logger/console';
 *
 * const logger = createLogger({ level: LogLevel.Debug });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const data = options.name !== undefined ? { name: options.name } : {};
  return new ConsoleLogger(data, options.level ?? LogLevel.Info);
}

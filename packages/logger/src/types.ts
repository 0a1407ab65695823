/**
 * Logging function type that supports both structured and simple logging.
 *
 * @example
 * ```typescript
 * logger.info({ route: '/users/:id' }, 'Route registered');
 * logger.info('Server started');
 * ```
 */
export type LogFn = {
  /** Structured logging with context object, optional message, and additional arguments */
  <T extends object>(obj: T, msg?: string, ...args: unknown[]): void;
  /** Simple string logging */
  (msg: string): void;
};

/**
 * Standard logger interface with multiple log levels and child logger support.
 * Satisfied by both the console logger and pino.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  trace: LogFn;
  /**
   * Creates a child logger with additional context.
   * Child loggers inherit parent context and add their own.
   */
  child(obj: Record<string, unknown>): Logger;
}

export enum LogLevel {
  Trace = 'trace',
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
  Fatal = 'fatal',
  Silent = 'silent',
}

export type CreateLoggerOptions = {
  /** Service name bound to every record */
  name?: string;
  /** Human-readable output through pino-pretty; ignored in production */
  pretty?: boolean;
  /** @default LogLevel.Info */
  level?: LogLevel;
  /** `true` masks the default credential paths; an array adds to them */
  redact?: boolean | string[];
};

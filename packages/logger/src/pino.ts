/**
 * pino-backed logger for deployed services.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@shapekit/logger/pino';
 *
 * const logger = createLogger({ name: 'todo-api', redact: true });
 * logger.info({ headers: { authorization: 'Bearer test-token' } }, 'Request');
 * // {"level":"INFO","name":"todo-api","headers":{"authorization":"[REDACTED]"},...}
 * ```
 *
 * @module
 */
import { pino } from 'pino';
import { type CreateLoggerOptions, type Logger, LogLevel } from './types';

export const REDACTED = '[REDACTED]';

/**
 * Credentials as they show up in bound request values and in the headers
 * request shapes read them from.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  'password',
  'token',
  'secret',
  'apiKey',
  '*.password',
  '*.token',
  '*.secret',
  '*.apiKey',
  'headers.authorization',
  'headers.cookie',
  'headers["x-api-key"]',
];

/** Paths to mask for a `redact` option; empty when redaction is off */
export function redactPaths(redact: boolean | string[] | undefined): string[] {
  if (!redact) {
    return [];
  }
  const extra = redact === true ? [] : redact;
  return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { name, level = LogLevel.Info } = options;
  const pretty =
    options.pretty === true && process.env.NODE_ENV !== 'production';
  const paths = redactPaths(options.redact);

  return pino({
    level,
    ...(name !== undefined && { name }),
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, ignore: 'pid,hostname' },
      },
    }),
    ...(paths.length > 0 && { redact: { paths, censor: REDACTED } }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
  });
}

import type { Logger } from '@shapekit/logger';
import type { Context as HonoContext } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { AppEnv } from './types';

/**
 * Per-request view handed to handlers and middleware.
 *
 * @example
 * ```typescript
 * const getTodo = handle(GetTodo, Todo, async (ctx, req) => {
 *   ctx.logger.info({ id: req.id }, 'Loading todo');
 *   return todos.get(req.id);
 * });
 * ```
 */
export class Context {
  private code: ContentfulStatusCode = 200;

  constructor(
    /** Underlying Hono context */
    readonly raw: HonoContext<AppEnv>,
  ) {}

  get logger(): Logger {
    return this.raw.var.logger;
  }

  /** Language validation messages were rendered in */
  get lang(): string {
    return this.raw.var.lang;
  }

  /** Status a handler's return value is written with; 200 unless changed */
  get statusCode(): ContentfulStatusCode {
    return this.code;
  }

  param(name: string): string | undefined {
    return this.raw.req.param(name);
  }

  query(name: string): string | undefined {
    return this.raw.req.query(name);
  }

  /** Request header value */
  header(name: string): string | undefined {
    return this.raw.req.header(name);
  }

  /** Reads a value set by an earlier stage of the same request */
  get(key: string): unknown {
    return this.raw.var.values.get(key);
  }

  set(key: string, value: unknown): this {
    this.raw.var.values.set(key, value);
    return this;
  }

  status(code: ContentfulStatusCode): this {
    this.code = code;
    return this;
  }

  /** Sets a response header */
  setHeader(name: string, value: string): this {
    this.raw.header(name, value);
    return this;
  }
}

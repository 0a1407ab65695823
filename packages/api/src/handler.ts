import type { Field, Shape } from '@shapekit/schema';
import { bindShape } from '@shapekit/schema';
import type { ResponseType } from '@shapekit/schema/openapi';
import { ValidationError } from '@shapekit/schema/validation';
import type { Context as HonoContext, MiddlewareHandler } from 'hono';
import { Context } from './Context';
import { jsonResponse } from './responses';
import type { AppEnv } from './types';
import { readBindingSources } from './utils/readBindingSources';

export type HandlerFn<TReq, TRes> = (
  ctx: Context,
  req: TReq,
) => TRes | Response | Promise<TRes | Response>;

export type MiddlewareFn<TReq> = (
  ctx: Context,
  req: TReq,
) => void | Response | Promise<void | Response>;

/** A stage that runs before the handler and passes control on */
export interface MiddlewareStage {
  readonly kind: 'middleware';
  readonly request: Shape<unknown>;
  readonly run: MiddlewareHandler<AppEnv>;
}

/** The terminal stage of a route; its return value is the response */
export interface HandlerStage {
  readonly kind: 'handler';
  readonly request: Shape<unknown>;
  readonly response?: ResponseType;
  readonly run: MiddlewareHandler<AppEnv>;
}

export type Stage = MiddlewareStage | HandlerStage;

/**
 * Binds the request into a shape value and validates it.
 *
 * @throws {BindingError} When a request part cannot be coerced
 * @throws {ValidationError} When a rule fails
 */
export async function bindRequest<T>(
  c: HonoContext<AppEnv>,
  shape: Shape<T>,
): Promise<T> {
  const sources = await readBindingSources(c, shape);
  const value = bindShape(shape, sources);

  const errors = c.var.validator.validate(shape, value, c.var.lang);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return value;
}

/**
 * Creates a route handler. The request is bound into `request`, validated,
 * and passed to `fn`; whatever `fn` returns is written as JSON with
 * `ctx.statusCode`, unless it is already a Response.
 *
 * @param response - Documented type of the response body
 *
 * @example
 * ```typescript
 * app.post(
 *   '/todos',
 *   handle(CreateTodo, Todo, async (ctx, req) => {
 *     ctx.status(201);
 *     return todos.create(req);
 *   }),
 * );
 * ```
 */
export function handle<TReq, TRes>(
  request: Shape<TReq>,
  response: Shape<TRes> | Field<TRes> | undefined,
  fn: HandlerFn<TReq, TRes>,
): HandlerStage {
  return {
    kind: 'handler',
    request,
    response,
    run: async (c) => {
      const req = await bindRequest(c, request);
      const ctx = new Context(c);

      const result = await fn(ctx, req);
      if (result instanceof Response) {
        return result;
      }
      return jsonResponse(c, result, ctx.statusCode);
    },
  };
}

/**
 * Creates a middleware stage. Its shape binds from the same request as the
 * handler's; throwing (or returning a Response) stops the route.
 *
 * @example
 * ```typescript
 * const requireToken = middleware(AuthHeader, (ctx, req) => {
 *   if (req.token !== 'Bearer test-token') {
 *     throw new UnauthorizedError('Invalid token');
 *   }
 *   ctx.set('user', 'tester');
 * });
 * ```
 */
export function middleware<TReq>(
  request: Shape<TReq>,
  fn: MiddlewareFn<TReq>,
): MiddlewareStage {
  return {
    kind: 'middleware',
    request,
    run: async (c, next) => {
      const req = await bindRequest(c, request);

      const result = await fn(new Context(c), req);
      if (result instanceof Response) {
        return result;
      }
      await next();
    },
  };
}

import type { Context as HonoContext } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Context } from './Context';
import type { AppEnv } from './types';

/**
 * Writes `data` as a JSON response on a Hono context.
 */
export function jsonResponse(
  c: HonoContext<AppEnv>,
  data: unknown,
  status: ContentfulStatusCode,
): Response {
  return c.body(JSON.stringify(data) ?? null, status, {
    'Content-Type': 'application/json',
  });
}

/**
 * Responds with `data` and an explicit status.
 *
 * @example
 * ```typescript
 * return json(ctx, 202, { queued: true });
 * ```
 */
export function json(
  ctx: Context,
  status: ContentfulStatusCode,
  data: unknown,
): Response {
  return jsonResponse(ctx.raw, data, status);
}

export function success(ctx: Context, data: unknown): Response {
  return json(ctx, 200, data);
}

export function created(ctx: Context, data: unknown): Response {
  return json(ctx, 201, data);
}

export function noContent(ctx: Context): Response {
  return ctx.raw.body(null, 204);
}

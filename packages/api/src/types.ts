import type { Logger } from '@shapekit/logger';
import type { ShapeValidator } from '@shapekit/schema/validation';

/**
 * Hono environment of every route an `App` serves. The variables are set
 * once per request before the first stage runs.
 */
export type AppEnv = {
  Variables: {
    /** Request-scoped child of the app logger */
    logger: Logger;
    /** Values shared between the stages of one request */
    values: Map<string, unknown>;
    validator: ShapeValidator;
    /** Language for validation messages, from Accept-Language */
    lang: string;
  };
};

/** Methods a route can be registered for. HEAD is answered by GET routes. */
export type RouteMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

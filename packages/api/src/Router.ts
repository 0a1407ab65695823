import type { HandlerStage, MiddlewareStage, Stage } from './handler';
import type { RouteMethod } from './types';

/** Middleware stages in order, then exactly one handler */
export type RouteStages = [...MiddlewareStage[], HandlerStage];

/** Joins a group prefix and a route path with a single slash */
export function joinPaths(prefix: string, path: string): string {
  const head = prefix.replace(/\/+$/, '');
  const tail = path.replace(/^\/+/, '');
  if (!tail) {
    return head || '/';
  }
  return `${head}/${tail}`;
}

function splitStages(stages: ReadonlyArray<Stage>): {
  middleware: MiddlewareStage[];
  handler: HandlerStage;
} {
  const middleware: MiddlewareStage[] = [];
  let handler: HandlerStage | undefined;

  for (const stage of stages) {
    if (stage.kind === 'handler') {
      handler = stage;
    } else {
      middleware.push(stage);
    }
  }

  if (!handler) {
    throw new Error('A route needs a handler stage created with handle()');
  }
  return { middleware, handler };
}

/**
 * Route registration shared by the app and its groups.
 */
export abstract class Router {
  abstract addRoute(
    method: RouteMethod,
    path: string,
    middleware: ReadonlyArray<MiddlewareStage>,
    handler: HandlerStage,
  ): void;

  on(method: RouteMethod, path: string, ...stages: RouteStages): this {
    const { middleware, handler } = splitStages(stages);
    this.addRoute(method, path, middleware, handler);
    return this;
  }

  get(path: string, ...stages: RouteStages): this {
    return this.on('GET', path, ...stages);
  }

  post(path: string, ...stages: RouteStages): this {
    return this.on('POST', path, ...stages);
  }

  put(path: string, ...stages: RouteStages): this {
    return this.on('PUT', path, ...stages);
  }

  patch(path: string, ...stages: RouteStages): this {
    return this.on('PATCH', path, ...stages);
  }

  delete(path: string, ...stages: RouteStages): this {
    return this.on('DELETE', path, ...stages);
  }

  /**
   * Creates a group whose routes share a path prefix and run `middleware`
   * before their own stages.
   *
   * @example
   * ```typescript
   * const admin = app.group('/admin', requireToken);
   * admin.get('/stats', handle(NoInput, Stats, () => stats()));
   * ```
   */
  group(prefix: string, ...middleware: MiddlewareStage[]): RouteGroup {
    return new RouteGroup(this, prefix, middleware);
  }
}

export class RouteGroup extends Router {
  constructor(
    private readonly parent: Router,
    readonly prefix: string,
    private readonly middleware: ReadonlyArray<MiddlewareStage>,
  ) {
    super();
  }

  addRoute(
    method: RouteMethod,
    path: string,
    middleware: ReadonlyArray<MiddlewareStage>,
    handler: HandlerStage,
  ): void {
    this.parent.addRoute(
      method,
      joinPaths(this.prefix, path),
      [...this.middleware, ...middleware],
      handler,
    );
  }
}

import { NotFoundError, isServerError } from '@shapekit/errors';
import type { Logger } from '@shapekit/logger';
import { DEFAULT_LOGGER } from '@shapekit/logger/console';
import type { Shape } from '@shapekit/schema';
import {
  OpenApiGenerator,
  type OpenApiGeneratorOptions,
  type ResponseType,
} from '@shapekit/schema/openapi';
import { ShapeValidator, resolveLanguage } from '@shapekit/schema/validation';
import { type ServerType, serve } from '@hono/node-server';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { renderSwaggerUI } from './docs';
import { toHttpError } from './errors';
import type { HandlerStage, MiddlewareStage } from './handler';
import { toContentfulStatus } from './helpers/http-status';
import { jsonResponse } from './responses';
import { Router } from './Router';
import type { AppEnv, RouteMethod } from './types';

export interface AppOptions {
  logger?: Logger;
  /** Validator for every route; register custom rules and translations on it */
  validator?: ShapeValidator;
}

export interface DocsOptions extends Omit<OpenApiGeneratorOptions, 'logger'> {
  /** @default '/openapi.json' */
  openapiPath?: string;
  /** @default '/docs' */
  docsPath?: string;
}

export interface StartOptions {
  /** @default 8080 */
  port?: number;
  /** @default '0.0.0.0' */
  hostname?: string;
}

interface RegisteredRoute {
  method: RouteMethod;
  path: string;
  shapes: Shape<unknown>[];
  response?: ResponseType;
}

/**
 * Hono application whose routes bind and validate typed request shapes and
 * document themselves as OpenAPI operations.
 *
 * @example
 * ```typescript
 * const app = new App({ logger: createLogger({ level: LogLevel.Info }) });
 *
 * app
 *   .withDocs({ title: 'Todo API', version: '1.0.0' })
 *   .get('/todos/:id', handle(GetTodo, Todo, (ctx, req) => todos.get(req.id)));
 *
 * app.start({ port: 3000 });
 * ```
 */
export class App extends Router {
  readonly hono = new Hono<AppEnv>();
  readonly logger: Logger;
  readonly validator: ShapeValidator;

  private readonly middleware: MiddlewareStage[] = [];
  private readonly routes: RegisteredRoute[] = [];
  private generator?: OpenApiGenerator;

  constructor(options: AppOptions = {}) {
    super();
    this.logger = options.logger ?? DEFAULT_LOGGER;
    this.validator = options.validator ?? new ShapeValidator();

    this.hono.use(async (c, next) => {
      c.set(
        'logger',
        this.logger.child({ method: c.req.method, path: c.req.path }),
      );
      c.set('values', new Map());
      c.set('validator', this.validator);
      c.set('lang', resolveLanguage(c.req.header('accept-language')));
      await next();
    });

    this.hono.onError((error, c) => {
      if (error instanceof HTTPException) {
        return error.getResponse();
      }

      const httpError = toHttpError(error);
      if (isServerError(httpError)) {
        c.var.logger.error(error, 'Error processing request');
      } else {
        c.var.logger.debug(
          { status: httpError.statusCode, reason: httpError.message },
          'Request rejected',
        );
      }

      return jsonResponse(
        c,
        httpError.toResponseBody(),
        toContentfulStatus(httpError.statusCode),
      );
    });

    this.hono.notFound((c) =>
      jsonResponse(c, new NotFoundError('Not Found').toResponseBody(), 404),
    );
  }

  /**
   * Adds app-level middleware. It runs before the stages of every route
   * registered after this call, and its shape is documented on them.
   */
  use(...stages: MiddlewareStage[]): this {
    this.middleware.push(...stages);
    return this;
  }

  addRoute(
    method: RouteMethod,
    path: string,
    middleware: ReadonlyArray<MiddlewareStage>,
    handler: HandlerStage,
  ): void {
    const stages = [...this.middleware, ...middleware];

    this.hono.on(
      method,
      [path],
      ...stages.map((stage) => stage.run),
      handler.run,
    );

    const route: RegisteredRoute = {
      method,
      path,
      shapes: [...stages.map((stage) => stage.request), handler.request],
      response: handler.response,
    };
    this.routes.push(route);
    this.generator?.addEndpoint(
      route.method,
      route.path,
      route.shapes,
      route.response,
    );

    this.logger.debug({ method, path }, 'Route registered');
  }

  /**
   * Serves the OpenAPI document and a Swagger UI page. Routes registered
   * before and after this call are documented.
   *
   * @throws {Error} When docs are already enabled
   */
  withDocs(options: DocsOptions = {}): this {
    if (this.generator) {
      throw new Error('API docs are already enabled');
    }

    const {
      openapiPath = '/openapi.json',
      docsPath = '/docs',
      ...generatorOptions
    } = options;

    const generator = new OpenApiGenerator({
      ...generatorOptions,
      logger: this.logger,
    });
    for (const route of this.routes) {
      generator.addEndpoint(
        route.method,
        route.path,
        route.shapes,
        route.response,
      );
    }
    this.generator = generator;

    this.hono.get(openapiPath, (c) =>
      jsonResponse(c, generator.generateDocument(), 200),
    );
    if (docsPath !== openapiPath) {
      this.hono.get(docsPath, (c) =>
        c.html(
          renderSwaggerUI({
            title: generator.pageTitle,
            specUrl: openapiPath,
          }),
        ),
      );
    }

    return this;
  }

  /** The OpenAPI document, once docs are enabled */
  document() {
    return this.generator?.generateDocument();
  }

  fetch(request: Request): Promise<Response> {
    return Promise.resolve(this.hono.fetch(request));
  }

  /**
   * Dispatches a request in-process.
   *
   * @example
   * ```typescript
   * const res = await app.request('/todos/1');
   * ```
   */
  request(input: string | URL | Request, init?: RequestInit): Promise<Response> {
    return Promise.resolve(this.hono.request(input, init));
  }

  start(options: StartOptions = {}): ServerType {
    const { port = 8080, hostname = '0.0.0.0' } = options;

    return serve(
      { fetch: (request) => this.hono.fetch(request), port, hostname },
      (info) => {
        this.logger.info(
          { address: info.address, port: info.port },
          'Server listening',
        );
      },
    );
  }
}

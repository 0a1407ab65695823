export {
  App,
  type AppOptions,
  type DocsOptions,
  type StartOptions,
} from './App';
export { Context } from './Context';
export { loadServerConfig, type ServerConfig } from './config';
export { type SwaggerPageOptions, renderSwaggerUI } from './docs';
export { toHttpError } from './errors';
export {
  bindRequest,
  handle,
  middleware,
  type HandlerFn,
  type HandlerStage,
  type MiddlewareFn,
  type MiddlewareStage,
  type Stage,
} from './handler';
export { created, json, noContent, success } from './responses';
export { RouteGroup, Router, joinPaths, type RouteStages } from './Router';
export type { AppEnv, RouteMethod } from './types';

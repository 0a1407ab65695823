import { isFileType } from '../fields';
import type { Shape } from '../shape';
import { describeShape, hasRule } from '../tags';
import type { SchemaMapper } from './mapper';
import type { ParameterEntry } from './types';

/**
 * Returns the placeholder names of a route path, in order.
 *
 * @example
 * ```typescript
 * extractPathParameters('/users/:id/posts/:postId'); // ['id', 'postId']
 * ```
 */
export function extractPathParameters(path: string): string[] {
  return path
    .split('/')
    .filter((segment) => segment.startsWith(':') && segment.length > 1)
    .map((segment) => segment.slice(1));
}

/** Rewrites `/users/:id` to the OpenAPI form `/users/{id}` */
export function toOpenApiPath(path: string): string {
  return path.replace(/:([^/]+)/g, '{$1}');
}

export interface ParamsOptions {
  /** Document `form` fields as query parameters. Defaults to true. */
  includeQuery?: boolean;
}

/**
 * Derives the parameters a shape contributes to an operation.
 *
 * Each field yields at most one parameter: a `uri` tag wins over `header`,
 * which wins over `form`. File fields are never parameters, and a query
 * parameter is skipped when its name is already a path placeholder.
 */
export function paramsFor(
  shape: Shape<unknown>,
  routePath: string,
  mapper: SchemaMapper,
  options: ParamsOptions = {},
): ParameterEntry[] {
  const { includeQuery = true } = options;
  const placeholders = new Set(extractPathParameters(routePath));
  const params: ParameterEntry[] = [];

  for (const descriptor of describeShape(shape)) {
    if (isFileType(descriptor.type)) {
      continue;
    }

    const { sources, rules } = descriptor;
    const required = hasRule(rules, 'required');

    if (sources.path) {
      params.push({
        name: sources.path,
        in: 'path',
        required: true,
        schema: mapper.schemaFor(descriptor.type),
      });
      continue;
    }

    if (sources.header) {
      params.push({
        name: sources.header,
        in: 'header',
        required,
        schema: mapper.schemaFor(descriptor.type),
      });
      continue;
    }

    if (sources.form && includeQuery && !placeholders.has(sources.form)) {
      params.push({
        name: sources.form,
        in: 'query',
        required,
        schema: mapper.schemaFor(descriptor.type),
      });
    }
  }

  return params;
}

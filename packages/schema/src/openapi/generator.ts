import type { Logger } from '@shapekit/logger';
import type { OpenAPIV3 } from 'openapi-types';
import { Field } from '../fields';
import type { Shape } from '../shape';
import { contentTypesFor } from './content-types';
import { SchemaMapper } from './mapper';
import { paramsFor, toOpenApiPath } from './parameters';
import { ComponentRegistry } from './registry';
import {
  type HttpMethod,
  type OpenApiSchemaOptions,
  type ParameterEntry,
  type SchemaNode,
  isBodyless,
  isReference,
} from './types';

export interface OpenApiGeneratorOptions extends OpenApiSchemaOptions {
  /** Title of the documentation page; defaults to the API title */
  pageTitle?: string;
  logger?: Logger;
}

/** What a route responds with: a shape, or a single field such as an array */
export type ResponseType = Shape<unknown> | Field<unknown>;

const LOWER_METHODS: { [M in HttpMethod]: Lowercase<M> } = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  PATCH: 'patch',
  DELETE: 'delete',
  HEAD: 'head',
  OPTIONS: 'options',
};

const ERROR_SCHEMA: OpenAPIV3.NonArraySchemaObject = {
  type: 'object',
  properties: {
    status: { type: 'integer' },
    message: { type: 'string' },
  },
};

const DEFAULT_DESCRIPTION = 'Auto-generated API documentation';

/**
 * Collects route registrations and assembles an OpenAPI 3.0 document.
 *
 * The component registry lives as long as the generator, so documents built
 * after new registrations reflect every route registered so far.
 *
 * @example
 * ```typescript
 * const generator = new OpenApiGenerator({ title: 'Todo API', version: '1.0.0' });
 * generator.addEndpoint('GET', '/todos/:id', [GetTodo], Todo);
 *
 * const document = generator.generateDocument();
 * ```
 */
export class OpenApiGenerator {
  readonly title: string;
  readonly version: string;
  readonly description: string;
  readonly pageTitle: string;

  private readonly registry = new ComponentRegistry();
  private readonly mapper: SchemaMapper;
  private readonly operations = new Map<
    string,
    Map<HttpMethod, OpenAPIV3.OperationObject>
  >();
  private readonly logger?: Logger;

  constructor(options: OpenApiGeneratorOptions = {}) {
    this.title = options.title ?? 'API';
    this.version = options.version ?? '1.0.0';
    this.description = options.description ?? DEFAULT_DESCRIPTION;
    this.pageTitle = options.pageTitle ?? this.title;
    this.logger = options.logger;
    this.mapper = new SchemaMapper(this.registry, this.logger);
  }

  /**
   * Registers or replaces the operation for `method` and `path`.
   *
   * @param shapes - Request shapes in stage order: middleware first, handler last
   * @param response - Type of the 200 response body
   */
  addEndpoint(
    method: HttpMethod,
    path: string,
    shapes: ReadonlyArray<Shape<unknown>>,
    response?: ResponseType,
  ): void {
    const operation: OpenAPIV3.OperationObject = {
      summary: `${method} ${path}`,
      responses: {
        '200': this.successResponse(response),
        '400': {
          description: 'Bad Request',
          content: { 'application/json': { schema: { ...ERROR_SCHEMA } } },
        },
      },
    };

    const bodyless = isBodyless(method);
    const parameters = dedupeParameters(
      shapes.flatMap((s) =>
        paramsFor(s, path, this.mapper, { includeQuery: bodyless }),
      ),
    );
    if (parameters.length > 0) {
      operation.parameters = parameters;
    }

    if (!bodyless) {
      const content = this.requestContent(shapes);
      if (Object.keys(content).length > 0) {
        operation.requestBody = {
          description: 'Request body',
          required: true,
          content,
        };
      }
    }

    let methods = this.operations.get(path);
    if (!methods) {
      methods = new Map();
      this.operations.set(path, methods);
    }
    methods.set(method, operation);

    this.logger?.debug(
      { method, path, shapes: shapes.length },
      'Registered OpenAPI operation',
    );
  }

  getOperation(
    method: HttpMethod,
    path: string,
  ): OpenAPIV3.OperationObject | undefined {
    const operation = this.operations.get(path)?.get(method);
    return operation ? structuredClone(operation) : undefined;
  }

  generateDocument(): OpenAPIV3.Document {
    const paths: OpenAPIV3.PathsObject = {};

    for (const [path, methods] of this.operations) {
      const item: OpenAPIV3.PathItemObject = {};
      for (const [method, operation] of methods) {
        item[LOWER_METHODS[method]] = operation;
      }
      paths[toOpenApiPath(path)] = item;
    }

    return structuredClone({
      openapi: '3.0.0',
      info: {
        title: this.title,
        version: this.version,
        description: this.description,
      },
      paths,
      components: { schemas: this.registry.snapshot() },
    });
  }

  toJSON(): string {
    return JSON.stringify(this.generateDocument(), null, 2);
  }

  private successResponse(response?: ResponseType): OpenAPIV3.ResponseObject {
    if (!response) {
      return { description: 'Success' };
    }

    const schema =
      response instanceof Field
        ? this.mapper.schemaFor(response.type)
        : this.mapper.structSchema(response);

    return {
      description: 'Success',
      content: { 'application/json': { schema } },
    };
  }

  /**
   * Content type → schema across every request shape. Shapes mapping to the
   * same content type have their properties merged.
   */
  private requestContent(
    shapes: ReadonlyArray<Shape<unknown>>,
  ): Record<string, OpenAPIV3.MediaTypeObject> {
    const content: Record<string, OpenAPIV3.MediaTypeObject> = {};

    for (const s of shapes) {
      const schema = this.mapper.structSchema(s);
      for (const type of contentTypesFor(s)) {
        const previous = content[type]?.schema;
        content[type] = { schema: mergeSchemas(previous, schema) };
      }
    }

    return content;
  }
}

function dedupeParameters(params: ParameterEntry[]): ParameterEntry[] {
  const seen = new Set<string>();
  return params.filter((param) => {
    const key = `${param.in}:${param.name}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Merges two object schemas into a new one. Properties of `next` win;
 * required lists are unioned.
 */
function mergeSchemas(
  previous: SchemaNode | undefined,
  next: SchemaNode,
): SchemaNode {
  if (!previous || isReference(previous) || isReference(next)) {
    return next;
  }

  const properties = { ...previous.properties, ...next.properties };
  const required = [
    ...new Set([...(previous.required ?? []), ...(next.required ?? [])]),
  ];

  const merged: OpenAPIV3.NonArraySchemaObject = { type: 'object' };
  if (Object.keys(properties).length > 0) {
    merged.properties = properties;
  }
  if (required.length > 0) {
    merged.required = required;
  }
  return merged;
}

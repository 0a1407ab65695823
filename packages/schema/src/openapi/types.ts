import type { OpenAPIV3 } from 'openapi-types';

export type HttpMethod =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'HEAD'
  | 'OPTIONS';

export type LowerHttpMethod<T extends HttpMethod> = Lowercase<T>;

/** A schema, or a reference to a component schema (cycles only) */
export type SchemaNode = OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;

export type ParameterLocation = 'path' | 'query' | 'header';

export interface ParameterEntry extends OpenAPIV3.ParameterObject {
  in: ParameterLocation;
  required: boolean;
  schema: SchemaNode;
}

export enum ContentType {
  Json = 'application/json',
  Form = 'application/x-www-form-urlencoded',
  Multipart = 'multipart/form-data',
}

export interface OpenApiSchemaOptions {
  title?: string;
  version?: string;
  description?: string;
}

export function isReference(
  node: SchemaNode | undefined,
): node is OpenAPIV3.ReferenceObject {
  return node !== undefined && '$ref' in node;
}

/** Methods documented with parameters only, never a request body */
export function isBodyless(method: HttpMethod): boolean {
  return method === 'GET' || method === 'HEAD';
}

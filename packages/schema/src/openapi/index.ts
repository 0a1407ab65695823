export { contentTypesFor } from './content-types';
export {
  OpenApiGenerator,
  type OpenApiGeneratorOptions,
  type ResponseType,
} from './generator';
export { SchemaMapper } from './mapper';
export {
  type ParamsOptions,
  extractPathParameters,
  paramsFor,
  toOpenApiPath,
} from './parameters';
export { ComponentRegistry } from './registry';
export {
  ContentType,
  type HttpMethod,
  type LowerHttpMethod,
  type OpenApiSchemaOptions,
  type ParameterEntry,
  type ParameterLocation,
  type SchemaNode,
  isBodyless,
  isReference,
} from './types';

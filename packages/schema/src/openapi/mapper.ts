import type { Logger } from '@shapekit/logger';
import type { OpenAPIV3 } from 'openapi-types';
import type { FieldType } from '../fields';
import type { Shape } from '../shape';
import { describeShape, formatRules, hasRule } from '../tags';
import type { ComponentRegistry } from './registry';
import { type SchemaNode, isReference } from './types';

const BINARY: OpenAPIV3.NonArraySchemaObject = {
  type: 'string',
  format: 'binary',
};

/**
 * Maps field kinds to OpenAPI schema nodes. Composite shapes are synthesized
 * once per name and stored in the component registry.
 */
export class SchemaMapper {
  constructor(
    private readonly registry: ComponentRegistry,
    private readonly logger?: Logger,
  ) {}

  schemaFor(type: FieldType): SchemaNode {
    switch (type.kind) {
      case 'string':
        return { type: 'string' };
      case 'integer':
        return { type: 'integer', format: 'int64' };
      case 'number':
        return { type: 'number', format: 'double' };
      case 'boolean':
        return { type: 'boolean' };
      case 'file':
        return { ...BINARY };
      case 'array':
        return { type: 'array', items: this.itemsFor(type.items) };
      case 'shape':
        return this.structSchema(type.shape());
      default:
        return { type: 'object' };
    }
  }

  /**
   * Element schemas are expanded for every declared kind; only `unknown`
   * elements fall back to a plain object.
   */
  private itemsFor(items: FieldType): SchemaNode {
    if (items.kind === 'unknown') {
      return { type: 'object' };
    }
    return this.schemaFor(items);
  }

  /**
   * Object schema of a shape. Properties are named by the `json` tag, falling
   * back to the `form` tag; fields with neither are left out.
   *
   * Returns the stored node when the shape's name is already registered, and
   * a `$ref` when the shape is reached again while it is being synthesized.
   */
  structSchema(shape: Shape<unknown>): SchemaNode {
    const name = this.registry.nameOf(shape);

    const existing = this.registry.get(name);
    if (existing) {
      return existing;
    }

    if (this.registry.isInProgress(name)) {
      this.logger?.debug({ shape: name }, 'Recursive shape resolved to $ref');
      return this.registry.getReference(name);
    }

    this.registry.begin(name);
    try {
      const properties: Record<string, SchemaNode> = {};
      const required: string[] = [];

      for (const descriptor of describeShape(shape)) {
        const propertyName = descriptor.sources.body ?? descriptor.sources.form;
        if (!propertyName) {
          continue;
        }

        let schema = this.schemaFor(descriptor.type);

        if (descriptor.rules.length > 0 && !isReference(schema)) {
          // Copy first: the node may be a registered component
          schema = {
            ...schema,
            description: `Validation: ${formatRules(descriptor.rules)}`,
            ...(hasRule(descriptor.rules, 'email') && { format: 'email' }),
          };
        }

        if (hasRule(descriptor.rules, 'required')) {
          required.push(propertyName);
        }

        properties[propertyName] = schema;
      }

      const schema: OpenAPIV3.NonArraySchemaObject = { type: 'object' };
      if (Object.keys(properties).length > 0) {
        schema.properties = properties;
      }
      if (required.length > 0) {
        schema.required = required;
      }

      this.registry.addSchema(name, schema);
      return schema;
    } finally {
      this.registry.end(name);
    }
  }
}

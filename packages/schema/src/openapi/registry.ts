import type { OpenAPIV3 } from 'openapi-types';
import type { Shape } from '../shape';

const ANONYMOUS = 'Anonymous';

/**
 * Named component schemas, stored once per name. Entries never expire:
 * a later lookup of the same name returns the stored node.
 *
 * Names that are being synthesized are tracked so a shape that refers to
 * itself resolves to a `$ref` instead of recursing.
 */
export class ComponentRegistry {
  private readonly schemas = new Map<string, OpenAPIV3.SchemaObject>();
  private readonly inProgress = new Set<string>();
  private readonly anonymousNames = new WeakMap<Shape<unknown>, string>();
  private anonymousCount = 0;

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get(name: string): OpenAPIV3.SchemaObject | undefined {
    return this.schemas.get(name);
  }

  addSchema(name: string, schema: OpenAPIV3.SchemaObject): void {
    this.schemas.set(name, schema);
  }

  getReference(name: string): OpenAPIV3.ReferenceObject {
    return { $ref: `#/components/schemas/${name}` };
  }

  /**
   * Component name of a shape. Anonymous shapes get `Anonymous`,
   * `Anonymous2`, ... in the order this registry first meets them, skipping
   * names already taken by a stored or in-progress schema.
   */
  nameOf(shape: Shape<unknown>): string {
    if (shape.name) {
      return shape.name;
    }

    let name = this.anonymousNames.get(shape);
    if (name) {
      return name;
    }

    do {
      this.anonymousCount += 1;
      name =
        this.anonymousCount === 1
          ? ANONYMOUS
          : `${ANONYMOUS}${this.anonymousCount}`;
    } while (this.schemas.has(name) || this.inProgress.has(name));

    this.anonymousNames.set(shape, name);
    return name;
  }

  begin(name: string): void {
    this.inProgress.add(name);
  }

  end(name: string): void {
    this.inProgress.delete(name);
  }

  isInProgress(name: string): boolean {
    return this.inProgress.has(name);
  }

  get size(): number {
    return this.schemas.size;
  }

  /**
   * Copy of the stored schemas, in registration order.
   */
  snapshot(): Record<string, OpenAPIV3.SchemaObject> {
    return structuredClone(Object.fromEntries(this.schemas));
  }
}

import type { StandardSchemaV1 } from '@standard-schema/spec';
import { BindingError, bindShape } from './binding';
import type { Field } from './fields';
import { defaultValidator } from './validation/validator';

export type FieldMap = Record<string, Field<unknown>>;

export type InferFields<F extends FieldMap> = {
  [K in keyof F]: F[K] extends Field<infer T> ? T : never;
};

export type InferShape<S> = S extends Shape<infer T> ? T : never;

/**
 * A named, ordered collection of typed fields describing a request or
 * response payload. Shapes are immutable once declared.
 *
 * A shape is also a Standard Schema: `~standard.validate` binds a JSON-like
 * value through the `json` tags and runs the validation rules with English
 * messages.
 *
 * @template TValue - The bound value type
 */
export class Shape<TValue = unknown> implements StandardSchemaV1<unknown, TValue> {
  declare readonly _output: TValue;

  constructor(
    /** Component name; anonymous shapes are named by the schema registry */
    readonly name: string | undefined,
    readonly fields: Readonly<FieldMap>,
  ) {}

  readonly '~standard': StandardSchemaV1.Props<unknown, TValue> = {
    version: 1,
    vendor: 'shapekit',
    validate: (value) => this.validateStandard(value),
  };

  private validateStandard(value: unknown): StandardSchemaV1.Result<TValue> {
    let bound: TValue;
    try {
      bound = bindShape(this, { json: value });
    } catch (error) {
      if (error instanceof BindingError) {
        return { issues: [{ message: error.message }] };
      }
      throw error;
    }

    const errors = defaultValidator.validate(this, bound);
    if (errors.length > 0) {
      return {
        issues: errors.map((e) => ({ message: e.message, path: e.path })),
      };
    }

    return { value: bound };
  }
}

/**
 * Declares a shape.
 *
 * @example
 * ```typescript
 * const GetUser = shape('GetUser', {
 *   id: field.string().uri('id'),
 *   limit: field.integer().form('limit'),
 * });
 *
 * type GetUserRequest = InferShape<typeof GetUser>;
 * // { id: string; limit: number }
 * ```
 */
export function shape<F extends FieldMap>(
  name: string,
  fields: F,
): Shape<InferFields<F>>;
export function shape<F extends FieldMap>(fields: F): Shape<InferFields<F>>;
export function shape<F extends FieldMap>(
  nameOrFields: string | F,
  fields?: F,
): Shape<InferFields<F>> {
  if (typeof nameOrFields === 'string') {
    return new Shape<InferFields<F>>(nameOrFields, fields ?? {});
  }
  return new Shape<InferFields<F>>(undefined, nameOrFields);
}

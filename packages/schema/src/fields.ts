import type { Shape } from './shape';

/**
 * Value kind of a field. Composite fields hold a thunk so a shape can
 * reference itself or a shape declared later in the module.
 */
export type FieldType =
  | { readonly kind: 'string' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'number' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'file' }
  | { readonly kind: 'unknown' }
  | { readonly kind: 'array'; readonly items: FieldType }
  | { readonly kind: 'shape'; readonly shape: () => Shape<unknown> };

export type FieldKind = FieldType['kind'];

/**
 * Raw tag values attached to a field. Each source tag has the form
 * `name,opt1,opt2`; an empty name or `-` opts the field out of that source.
 */
export interface FieldTags {
  /** Key in a JSON request or response body */
  readonly json?: string;
  /** Key in the query string or a form/multipart body */
  readonly form?: string;
  /** Route placeholder name (`:id` in `/users/:id`) */
  readonly uri?: string;
  /** Request header name */
  readonly header?: string;
  /** Comma separated validation rules, e.g. `required,min=3` */
  readonly validate?: string;
}

/**
 * Immutable field declaration. Every tag method returns a new field, so a
 * base field can be shared between shapes.
 *
 * @template TValue - The type the field binds to
 */
export class Field<TValue> {
  declare readonly _output: TValue;

  constructor(
    readonly type: FieldType,
    readonly tags: FieldTags = {},
  ) {}

  json(tag: string): Field<TValue> {
    return this.withTags({ json: tag });
  }

  form(tag: string): Field<TValue> {
    return this.withTags({ form: tag });
  }

  uri(tag: string): Field<TValue> {
    return this.withTags({ uri: tag });
  }

  header(tag: string): Field<TValue> {
    return this.withTags({ header: tag });
  }

  validate(rules: string): Field<TValue> {
    return this.withTags({ validate: rules });
  }

  private withTags(tags: FieldTags): Field<TValue> {
    return new Field<TValue>(this.type, { ...this.tags, ...tags });
  }
}

export type InferField<F> = F extends Field<infer T> ? T : never;

/**
 * Field builders.
 *
 * @example
 * ```typescript
 * const CreateTodo = shape('CreateTodo', {
 *   title: field.string().json('title').validate('required,min=3'),
 *   done: field.boolean().json('done'),
 *   attachment: field.file().form('attachment'),
 * });
 * ```
 */
export const field = {
  string: () => new Field<string>({ kind: 'string' }),
  integer: () => new Field<number>({ kind: 'integer' }),
  number: () => new Field<number>({ kind: 'number' }),
  boolean: () => new Field<boolean>({ kind: 'boolean' }),
  /** Binary upload; absent unless the request carried a file part */
  file: () => new Field<File | undefined>({ kind: 'file' }),
  unknown: () => new Field<unknown>({ kind: 'unknown' }),
  array: <T>(items: Field<T>) =>
    new Field<Array<Exclude<T, undefined>>>({
      kind: 'array',
      items: items.type,
    }),
  shape: <T>(ref: Shape<T> | (() => Shape<T>)) =>
    new Field<T>({
      kind: 'shape',
      shape: typeof ref === 'function' ? ref : () => ref,
    }),
};

export function isFileType(type: FieldType): boolean {
  return (
    type.kind === 'file' ||
    (type.kind === 'array' && type.items.kind === 'file')
  );
}

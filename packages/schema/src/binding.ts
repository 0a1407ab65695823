import type { FieldType } from './fields';
import type { Shape } from './shape';
import { type FieldDescriptor, describeShape } from './tags';

export type BindingSource =
  | 'JSON'
  | 'Form'
  | 'Multipart'
  | 'Query'
  | 'Path'
  | 'Header';

export type FormValue = string | File;

/** Values per key, in the order the request carried them */
export type ValueSource = Readonly<Record<string, ReadonlyArray<FormValue>>>;

export interface BindingSources {
  /** Decoded JSON body */
  json?: unknown;
  /** Form or multipart body fields */
  form?: ValueSource;
  formKind?: 'Form' | 'Multipart';
  query?: ValueSource;
  path?: ValueSource;
  /** Header values keyed by lower-cased header name */
  header?: ValueSource;
}

export class BindingError extends Error {
  constructor(
    readonly source: BindingSource,
    readonly detail: string,
  ) {
    super(`${source} binding failed: ${detail}`);
    this.name = 'BindingError';
  }
}

const INTEGER = /^[-+]?\d+$/;
const TRUE_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'false', 'FALSE', 'False']);

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Zero value of a field kind: what a field holds when the request did not
 * carry it.
 */
export function zeroValue(type: FieldType): unknown {
  switch (type.kind) {
    case 'string':
      return '';
    case 'integer':
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'array':
      return [];
    case 'shape':
      return zeroShape(type.shape());
    default:
      return undefined;
  }
}

function zeroShape(
  shape: Shape<unknown>,
  seen: Set<Shape<unknown>> = new Set(),
): Record<string, unknown> {
  const target: Record<string, unknown> = {};
  seen.add(shape);
  for (const descriptor of describeShape(shape)) {
    const { type } = descriptor;
    if (type.kind === 'shape') {
      const nested = type.shape();
      // Self-referential shapes stop at the first repeat
      target[descriptor.name] = seen.has(nested)
        ? undefined
        : zeroShape(nested, new Set(seen));
    } else {
      target[descriptor.name] = zeroValue(type);
    }
  }
  return target;
}

function coerceJson(
  type: FieldType,
  value: unknown,
  name: string,
): unknown {
  if (value === null || value === undefined) {
    return zeroValue(type);
  }

  const mismatch = () =>
    new BindingError(
      'JSON',
      `field "${name}" expects ${type.kind}, got ${describeValue(value)}`,
    );

  switch (type.kind) {
    case 'string':
      if (typeof value !== 'string') throw mismatch();
      return value;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw mismatch();
      }
      return value;
    case 'number':
      if (typeof value !== 'number') throw mismatch();
      return value;
    case 'boolean':
      if (typeof value !== 'boolean') throw mismatch();
      return value;
    case 'array':
      if (!Array.isArray(value)) throw mismatch();
      return value.map((item, i) =>
        coerceJson(type.items, item, `${name}[${i}]`),
      );
    case 'shape':
      if (typeof value !== 'object' || Array.isArray(value)) {
        throw mismatch();
      }
      return bindJsonObject(type.shape(), value, zeroShape(type.shape()));
    case 'file':
      // Uploads only arrive through multipart bodies
      return undefined;
    default:
      return value;
  }
}

function bindJsonObject(
  shape: Shape<unknown>,
  body: object,
  target: Record<string, unknown>,
): Record<string, unknown> {
  for (const descriptor of describeShape(shape)) {
    const key = descriptor.sources.body;
    if (!key || !Object.hasOwn(body, key)) {
      continue;
    }
    const value: unknown = Reflect.get(body, key);
    target[descriptor.name] = coerceJson(descriptor.type, value, key);
  }
  return target;
}

function coerceString(
  type: FieldType,
  value: string,
  name: string,
  source: BindingSource,
): unknown {
  switch (type.kind) {
    case 'integer':
      if (value === '') return 0;
      if (!INTEGER.test(value)) {
        throw new BindingError(
          source,
          `field "${name}" expects integer, got "${value}"`,
        );
      }
      return Number.parseInt(value, 10);
    case 'number': {
      if (value === '') return 0;
      const parsed = Number(value);
      if (Number.isNaN(parsed)) {
        throw new BindingError(
          source,
          `field "${name}" expects number, got "${value}"`,
        );
      }
      return parsed;
    }
    case 'boolean':
      if (value === '' || FALSE_VALUES.has(value)) return false;
      if (TRUE_VALUES.has(value)) return true;
      throw new BindingError(
        source,
        `field "${name}" expects boolean, got "${value}"`,
      );
    default:
      return value;
  }
}

function coerceValues(
  type: FieldType,
  values: ReadonlyArray<FormValue>,
  name: string,
  source: BindingSource,
): unknown {
  const strings = values.filter((v): v is string => typeof v === 'string');
  const files = values.filter((v): v is File => typeof v !== 'string');

  switch (type.kind) {
    case 'file':
      return files[0];
    case 'array':
      if (type.items.kind === 'file') {
        return files;
      }
      return strings.map((v) => coerceString(type.items, v, name, source));
    case 'shape':
      // Nested shapes only bind from JSON bodies
      return undefined;
    default:
      if (strings.length === 0) {
        return undefined;
      }
      return coerceString(type, strings[0], name, source);
  }
}

function keyFor(
  descriptor: FieldDescriptor,
  source: BindingSource,
): string | undefined {
  switch (source) {
    case 'Path':
      return descriptor.sources.path;
    case 'Header':
      return descriptor.sources.header?.toLowerCase();
    case 'JSON':
      return descriptor.sources.body;
    default:
      return descriptor.sources.form;
  }
}

function bindValues(
  shape: Shape<unknown>,
  values: ValueSource,
  source: BindingSource,
  target: Record<string, unknown>,
): void {
  for (const descriptor of describeShape(shape)) {
    const key = keyFor(descriptor, source);
    if (!key) {
      continue;
    }

    const found = values[key];
    if (!found || found.length === 0) {
      continue;
    }

    const coerced = coerceValues(descriptor.type, found, key, source);
    if (coerced !== undefined) {
      target[descriptor.name] = coerced;
    }
  }
}

/**
 * Builds a shape value from the parts of a request.
 *
 * Sources bind in order (body, query, path, header), each overwriting the
 * fields it carries. Fields no source carried keep their zero value.
 *
 * @throws {BindingError} When a value cannot be coerced to its field kind
 */
export function bindShape<T>(shape: Shape<T>, sources: BindingSources): T {
  const target = zeroShape(shape);

  if (sources.json !== undefined) {
    const body = sources.json;
    if (body === null || typeof body !== 'object' || Array.isArray(body)) {
      throw new BindingError(
        'JSON',
        `expected an object body, got ${describeValue(body)}`,
      );
    }
    bindJsonObject(shape, body, target);
  } else if (sources.form) {
    bindValues(shape, sources.form, sources.formKind ?? 'Form', target);
  }

  if (sources.query) bindValues(shape, sources.query, 'Query', target);
  if (sources.path) bindValues(shape, sources.path, 'Path', target);
  if (sources.header) bindValues(shape, sources.header, 'Header', target);

  return target as T;
}

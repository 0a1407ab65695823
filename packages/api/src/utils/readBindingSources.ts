import {
  BindingError,
  type BindingSources,
  type FormValue,
  type Shape,
  type ValueSource,
  describeShape,
} from '@shapekit/schema';
import type { Context } from 'hono';
import type { AppEnv } from '../types';

const FORM = 'application/x-www-form-urlencoded';
const MULTIPART = 'multipart/form-data';

/** Media type of a Content-Type header, without parameters */
export function mediaType(contentType: string | undefined): string {
  return contentType?.split(';')[0]?.trim().toLowerCase() ?? '';
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isFormValue(value: unknown): value is FormValue {
  return typeof value === 'string' || value instanceof File;
}

function toValueSource(data: Record<string, unknown>): ValueSource {
  const values: Record<string, FormValue[]> = {};
  for (const [key, value] of Object.entries(data)) {
    const list: unknown[] = Array.isArray(value) ? value : [value];
    values[key] = list.filter(isFormValue);
  }
  return values;
}

function hasBody(c: Context<AppEnv>): boolean {
  const { method } = c.req;
  if (method === 'GET' || method === 'HEAD') {
    return false;
  }
  return c.req.raw.body !== null && c.req.header('content-length') !== '0';
}

/**
 * Reads the request body by content type. Form and multipart bodies become
 * form values; anything else is parsed as JSON. Hono caches the parsed body,
 * so every stage of a route can read it.
 *
 * @throws {BindingError} When the body cannot be parsed
 */
async function readBody(
  c: Context<AppEnv>,
): Promise<Pick<BindingSources, 'json' | 'form' | 'formKind'>> {
  if (!hasBody(c)) {
    return {};
  }

  const type = mediaType(c.req.header('content-type'));
  if (type === FORM || type === MULTIPART) {
    const formKind = type === FORM ? 'Form' : 'Multipart';
    try {
      const parsed = await c.req.parseBody({ all: true });
      return { form: toValueSource(parsed), formKind };
    } catch (error) {
      throw new BindingError(formKind, describeFailure(error));
    }
  }

  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }

  try {
    const json: unknown = JSON.parse(text);
    return { json };
  } catch (error) {
    throw new BindingError('JSON', describeFailure(error));
  }
}

/**
 * Collects every request part a shape can bind from: the body, the query
 * string, the route placeholders it names, and the headers.
 */
export async function readBindingSources(
  c: Context<AppEnv>,
  shape: Shape<unknown>,
): Promise<BindingSources> {
  const body = await readBody(c);

  const path: Record<string, FormValue[]> = {};
  for (const descriptor of describeShape(shape)) {
    const name = descriptor.sources.path;
    if (!name) {
      continue;
    }
    const value = c.req.param(name);
    if (value !== undefined) {
      path[name] = [value];
    }
  }

  const header: Record<string, FormValue[]> = {};
  for (const [name, value] of Object.entries(c.req.header())) {
    header[name.toLowerCase()] = [value];
  }

  return {
    ...body,
    query: c.req.queries(),
    path,
    header,
  };
}

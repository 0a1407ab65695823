import type { FieldType } from './fields';
import type { Shape } from './shape';

export interface ParsedTag {
  /** Binding key: the segment before the first comma */
  name: string;
  options: string[];
}

export interface ValidationRule {
  name: string;
  param?: string;
}

/** Resolved binding keys; a source is absent when the field opts out of it */
export interface FieldSources {
  body?: string;
  form?: string;
  path?: string;
  header?: string;
}

export interface FieldDescriptor {
  /** Declared field name (the key in the shape's field map) */
  name: string;
  type: FieldType;
  sources: FieldSources;
  rules: ValidationRule[];
}

/**
 * Parses a source tag such as `email,omitempty`.
 * Returns undefined when the tag is missing, `-`, or has an empty name.
 */
export function parseTag(tag: string | undefined): ParsedTag | undefined {
  if (tag === undefined || tag === '-') {
    return undefined;
  }

  const [name, ...options] = tag.split(',');
  if (!name) {
    return undefined;
  }

  return { name, options };
}

/**
 * Parses `required,min=3,max=20` into an ordered rule list.
 */
export function parseRules(rules: string | undefined): ValidationRule[] {
  if (!rules) {
    return [];
  }

  const parsed: ValidationRule[] = [];
  for (const segment of rules.split(',')) {
    const trimmed = segment.trim();
    if (!trimmed) {
      continue;
    }

    const eq = trimmed.indexOf('=');
    if (eq === -1) {
      parsed.push({ name: trimmed });
    } else {
      parsed.push({
        name: trimmed.slice(0, eq),
        param: trimmed.slice(eq + 1),
      });
    }
  }

  return parsed;
}

export function hasRule(rules: ValidationRule[], name: string): boolean {
  return rules.some((rule) => rule.name === name);
}

export function formatRules(rules: ValidationRule[]): string {
  return rules
    .map((rule) =>
      rule.param !== undefined ? `${rule.name}=${rule.param}` : rule.name,
    )
    .join(',');
}

const descriptorCache = new WeakMap<Shape<unknown>, FieldDescriptor[]>();

/**
 * Describes every declared field of a shape, tagged or not, in declaration
 * order. Computed once per shape.
 */
export function describeShape(shape: Shape<unknown>): FieldDescriptor[] {
  const cached = descriptorCache.get(shape);
  if (cached) {
    return cached;
  }

  const descriptors = Object.entries(shape.fields).map(([name, f]) => {
    const sources: FieldSources = {};
    const body = parseTag(f.tags.json)?.name;
    const form = parseTag(f.tags.form)?.name;
    const path = parseTag(f.tags.uri)?.name;
    const header = parseTag(f.tags.header)?.name;

    if (body) sources.body = body;
    if (form) sources.form = form;
    if (path) sources.path = path;
    if (header) sources.header = header;

    return {
      name,
      type: f.type,
      sources,
      rules: parseRules(f.tags.validate),
    };
  });

  descriptorCache.set(shape, descriptors);
  return descriptors;
}

export function hasSource(descriptor: FieldDescriptor): boolean {
  const { body, form, path, header } = descriptor.sources;
  return Boolean(body || form || path || header);
}

/**
 * Returns the fields that bind from at least one request source.
 */
export function extractFields(shape: Shape<unknown>): FieldDescriptor[] {
  return describeShape(shape).filter(hasSource);
}

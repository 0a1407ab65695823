import { z } from 'zod/v4';
import type { FieldType } from '../fields';

/**
 * Checks one rule against a bound field value.
 * `param` is the text after `=` in the rule (`min=3` → `"3"`).
 */
export type RuleCheck = (
  value: unknown,
  param: string | undefined,
  type: FieldType,
) => boolean;

const NUMERIC = /^[-+]?[0-9]+(?:\.[0-9]+)?$/;
const ALPHA = /^[a-zA-Z]+$/;
const ALPHANUM = /^[a-zA-Z0-9]+$/;

const emailSchema = z.email();

/**
 * Whether a value is the zero value of its kind ("", 0, false, empty array,
 * missing). Nested objects are never zero.
 */
export function isZero(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value === '';
  if (typeof value === 'number') return value === 0;
  if (typeof value === 'boolean') return value === false;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Size used by `min`, `max` and `len`: characters for strings, the value for
 * numbers, the element count for arrays.
 */
function sizeOf(value: unknown): number | undefined {
  if (typeof value === 'string') return [...value].length;
  if (typeof value === 'number') return value;
  if (Array.isArray(value)) return value.length;
  return undefined;
}

function compareSize(
  compare: (size: number, limit: number) => boolean,
): RuleCheck {
  return (value, param) => {
    const limit = Number(param);
    const size = sizeOf(value);
    if (param === undefined || Number.isNaN(limit) || size === undefined) {
      return true;
    }
    return compare(size, limit);
  };
}

function matches(pattern: RegExp): RuleCheck {
  return (value) => typeof value === 'string' && pattern.test(value);
}

export const BUILT_IN_RULES: Readonly<Record<string, RuleCheck>> = {
  required: (value) => !isZero(value),
  email: (value) =>
    typeof value === 'string' && emailSchema.safeParse(value).success,
  min: compareSize((size, limit) => size >= limit),
  max: compareSize((size, limit) => size <= limit),
  len: compareSize((size, limit) => size === limit),
  numeric: (value) =>
    typeof value === 'number' ||
    (typeof value === 'string' && NUMERIC.test(value)),
  alpha: matches(ALPHA),
  alphanum: matches(ALPHANUM),
};

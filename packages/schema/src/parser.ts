import type { StandardSchemaV1 } from '@standard-schema/spec';

export class SchemaParseError extends Error {
  constructor(readonly issues: ReadonlyArray<StandardSchemaV1.Issue>) {
    super(issues.map((issue) => issue.message).join('; '));
    this.name = 'SchemaParseError';
  }
}

/**
 * Validates data against a Standard Schema (a shape, or a zod schema).
 *
 * @returns Validation result with value or issues
 */
export function validate<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  data: unknown,
) {
  return schema['~standard'].validate(data);
}

/**
 * @throws {SchemaParseError} When the schema reports issues
 */
export async function parseSchema<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  data: unknown,
): Promise<Output> {
  const parsed = await validate(schema, data);

  if (parsed.issues) {
    throw new SchemaParseError(parsed.issues);
  }

  return parsed.value;
}

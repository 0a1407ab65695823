import { BadRequestError, type HttpError, wrapError } from '@shapekit/errors';
import { BindingError } from '@shapekit/schema';
import { ValidationError } from '@shapekit/schema/validation';

/**
 * Maps anything a stage throws to the HttpError the response is written
 * from. Binding and validation failures become 400s; other errors go
 * through `wrapError`.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof BindingError) {
    return new BadRequestError(error.message);
  }

  if (error instanceof ValidationError) {
    const messages = error.errors.map((e) => e.message).join('; ');
    return new BadRequestError(`Validation failed: ${messages}`, {
      errors: error.errors,
    });
  }

  return wrapError(error);
}

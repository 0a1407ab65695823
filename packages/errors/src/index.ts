/**
 * JSON body written for every error response. `code` and `details` appear
 * only when set.
 */
export interface ErrorResponseBody {
  status: number;
  message: string;
  code?: string;
  details?: unknown;
}

export interface HttpErrorOptions {
  /** Application-specific code clients can branch on */
  code?: string;
  details?: unknown;
  cause?: unknown;
}

const STATUS_TEXT: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  501: 'Not Implemented',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

/** Reason phrase for an error status, `HTTP Error` when unlisted */
export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? 'HTTP Error';
}

/**
 * Error carrying the status its response is written with. Throw it (or a
 * subclass) from a handler or middleware to answer with that status.
 *
 * @example
 * ```typescript
 * throw new HttpError(409, 'Todo already exists', { code: 'TODO_EXISTS' });
 * ```
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly code?: string;
  readonly details?: unknown;
  /** Marker for errors that crossed a module boundary */
  readonly isHttpError = true;

  constructor(
    statusCode: number,
    message?: string,
    options: HttpErrorOptions = {},
  ) {
    super(message || statusText(statusCode), { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = options.code;
    this.details = options.details;
  }

  toResponseBody(): ErrorResponseBody {
    return {
      status: this.statusCode,
      message: this.message,
      ...(this.code !== undefined && { code: this.code }),
      ...(this.details !== undefined && { details: this.details }),
    };
  }

  toString(): string {
    return `HTTP ${this.statusCode}: ${this.message}`;
  }

  /** Log representation; keeps the stack, unlike the response body */
  toJSON() {
    return {
      name: this.name,
      statusCode: this.statusCode,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

export class BadRequestError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(400, message, { details });
  }
}

/**
 * @example
 * ```typescript
 * throw new UnauthorizedError('Invalid token');
 * ```
 */
export class UnauthorizedError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(401, message, { details });
  }
}

/** The caller is known but may not touch the resource */
export class ForbiddenError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(403, message, { details });
  }
}

export class NotFoundError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(404, message, { details });
  }
}

export class ConflictError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(409, message, { details });
  }
}

export class InternalServerError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(500, message, { details });
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(message?: string, details?: unknown) {
    super(503, message, { details });
  }
}

/**
 * Duck-typed as well as `instanceof`, so errors from another copy of this
 * package are recognised.
 */
export function isHttpError(error: unknown): error is HttpError {
  return (
    error instanceof HttpError ||
    (typeof error === 'object' &&
      error !== null &&
      'isHttpError' in error &&
      error.isHttpError === true)
  );
}

export function isClientError(error: unknown): error is HttpError {
  return (
    isHttpError(error) && error.statusCode >= 400 && error.statusCode < 500
  );
}

export function isServerError(error: unknown): boolean {
  return isHttpError(error) && error.statusCode >= 500;
}

/**
 * Returns HttpErrors unchanged and wraps anything else, keeping it as the
 * cause.
 *
 * @example
 * ```typescript
 * try {
 *   await todos.save(todo);
 * } catch (error) {
 *   throw wrapError(error, 503);
 * }
 * ```
 */
export function wrapError(
  error: unknown,
  statusCode = 500,
  message?: string,
): HttpError {
  if (isHttpError(error)) {
    return error;
  }
  return new HttpError(statusCode, message, { cause: error });
}

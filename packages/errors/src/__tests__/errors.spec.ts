import { describe, expect, it } from 'vitest';
import {
  BadRequestError,
  ConflictError,
  ForbiddenError,
  HttpError,
  InternalServerError,
  NotFoundError,
  ServiceUnavailableError,
  UnauthorizedError,
  isClientError,
  isHttpError,
  isServerError,
  statusText,
  wrapError,
} from '../index';

describe('HttpError', () => {
  it('should carry its status and message', () => {
    const error = new HttpError(409, 'Todo already exists');

    expect(error).toBeInstanceOf(Error);
    expect(error.statusCode).toBe(409);
    expect(error.message).toBe('Todo already exists');
    expect(error.name).toBe('HttpError');
  });

  it('should default the message to the reason phrase', () => {
    expect(new HttpError(404).message).toBe('Not Found');
    expect(new HttpError(418).message).toBe('HTTP Error');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket closed');

    expect(new HttpError(503, 'Unavailable', { cause }).cause).toBe(cause);
  });

  it('should format like the status line', () => {
    expect(String(new NotFoundError('Todo not found'))).toBe(
      'HTTP 404: Todo not found',
    );
  });

  describe('toResponseBody', () => {
    it('should render status and message only', () => {
      expect(new NotFoundError('Todo not found').toResponseBody()).toEqual({
        status: 404,
        message: 'Todo not found',
      });
    });

    it('should add code and details when present', () => {
      const error = new HttpError(400, 'Invalid input', {
        code: 'INVALID_INPUT',
        details: { field: 'title' },
      });

      expect(error.toResponseBody()).toEqual({
        status: 400,
        message: 'Invalid input',
        code: 'INVALID_INPUT',
        details: { field: 'title' },
      });
    });
  });

  it('should serialize for logs with the stack', () => {
    const json = new BadRequestError('Bad title').toJSON();

    expect(json.name).toBe('BadRequestError');
    expect(json.statusCode).toBe(400);
    expect(json.stack).toContain('Bad title');
  });
});

describe('subclasses', () => {
  it.each([
    [new BadRequestError(), 400, 'Bad Request'],
    [new UnauthorizedError(), 401, 'Unauthorized'],
    [new ForbiddenError(), 403, 'Forbidden'],
    [new NotFoundError(), 404, 'Not Found'],
    [new ConflictError(), 409, 'Conflict'],
    [new InternalServerError(), 500, 'Internal Server Error'],
    [new ServiceUnavailableError(), 503, 'Service Unavailable'],
  ])('%s has status %i', (error, status, message) => {
    expect(error.statusCode).toBe(status);
    expect(error.message).toBe(message);
    expect(error).toBeInstanceOf(HttpError);
  });

  it('should pass details through', () => {
    expect(new UnauthorizedError('Expired', { at: 'login' }).details).toEqual(
      { at: 'login' },
    );
  });
});

describe('guards', () => {
  it('should recognise HttpErrors by marker', () => {
    expect(isHttpError(new NotFoundError())).toBe(true);
    expect(isHttpError({ isHttpError: true, statusCode: 400 })).toBe(true);
    expect(isHttpError(new Error('plain'))).toBe(false);
    expect(isHttpError(null)).toBe(false);
  });

  it('should split client and server errors', () => {
    expect(isClientError(new ConflictError())).toBe(true);
    expect(isClientError(new InternalServerError())).toBe(false);
    expect(isServerError(new ServiceUnavailableError())).toBe(true);
    expect(isServerError(new BadRequestError())).toBe(false);
  });
});

describe('wrapError', () => {
  it('should return HttpErrors unchanged', () => {
    const error = new ForbiddenError();

    expect(wrapError(error)).toBe(error);
  });

  it('should wrap anything else as a 500 by default', () => {
    const cause = new Error('boom');
    const error = wrapError(cause);

    expect(error.statusCode).toBe(500);
    expect(error.message).toBe('Internal Server Error');
    expect(error.cause).toBe(cause);
  });

  it('should take a status and message', () => {
    const error = wrapError('timeout', 503, 'Storage unavailable');

    expect(error.statusCode).toBe(503);
    expect(error.message).toBe('Storage unavailable');
    expect(error.cause).toBe('timeout');
  });
});

describe('statusText', () => {
  it('should name listed statuses', () => {
    expect(statusText(422)).toBe('Unprocessable Entity');
    expect(statusText(599)).toBe('HTTP Error');
  });
});

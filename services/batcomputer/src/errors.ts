/**
 * Client-visible failures. Each carries the status code and the human-readable
 * `detail` string that the error handler in `server.ts` sends back.
 */
export class HttpError extends Error {
  readonly statusCode: number;
  readonly detail: string;

  constructor(statusCode: number, detail: string) {
    super(detail);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.detail = detail;
  }
}

export class BadRequestError extends HttpError {
  constructor(detail: string) {
    super(400, detail);
  }
}

/** Duplicate name; answered with 400. */
export class ConflictError extends HttpError {
  constructor(detail: string) {
    super(400, detail);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(detail: string) {
    super(401, detail);
  }
}

export class ForbiddenError extends HttpError {
  constructor(detail: string) {
    super(403, detail);
  }
}

export class NotFoundError extends HttpError {
  constructor(detail: string) {
    super(404, detail);
  }
}

/** Request input that failed its zod schema; `errors` is the flattened zod error. */
export class ValidationError extends HttpError {
  readonly errors: unknown;

  constructor(errors: unknown) {
    super(422, 'Request validation failed');
    this.errors = errors;
  }
}

export class ServerError extends HttpError {
  constructor(detail: string) {
    super(500, detail);
  }
}

export class BadGatewayError extends HttpError {
  constructor(detail: string) {
    super(502, detail);
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(detail: string) {
    super(503, detail);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

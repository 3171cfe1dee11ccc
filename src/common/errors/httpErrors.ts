/**
 * Base class for custom HTTP errors.
 * Ensures errors have a status code, an optional application-specific error code,
 * and optional additional data.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly data: unknown | null;

  constructor(status: number, message: string, code?: string, data: unknown | null = null) {
    super(message);
    this.status = status;
    this.code = code || this.constructor.name;
    this.data = data;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Represents a 400 Bad Request error.
 */
export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', data: unknown | null = null) {
    super(400, message, 'ERR_BAD_REQUEST', data);
  }
}

/**
 * Represents a 422 Unprocessable Entity error, typically used for validation failures.
 */
export class ValidationError extends HttpError {
  constructor(message = 'Validation Failed', errors: unknown | null = null) {
    super(422, message, 'ERR_VALIDATION', errors);
  }
}

/**
 * Represents a 401 Unauthorized error.
 */
export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized') {
    super(401, message, 'ERR_UNAUTHORIZED');
  }
}

/**
 * Represents a 403 Forbidden error.
 */
export class ForbiddenError extends HttpError {
  constructor(message = 'Forbidden') {
    super(403, message, 'ERR_FORBIDDEN');
  }
}

/**
 * Represents a 404 Not Found error.
 */
export class NotFoundError extends HttpError {
  constructor(message = 'Not Found') {
    super(404, message, 'ERR_NOT_FOUND');
  }
}

/**
 * Represents a 429 Too Many Requests error.
 * `retryAfterSeconds` is exposed to the client through the Retry-After header.
 */
export class TooManyRequestsError extends HttpError {
  public readonly retryAfterSeconds: number;

  constructor(message = 'Too Many Requests', retryAfterSeconds = 1) {
    super(429, message, 'ERR_RATE_LIMITED');
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Represents a 500 Internal Server Error.
 */
export class InternalServerError extends HttpError {
  constructor(message = 'Internal Server Error', data: unknown | null = null) {
    super(500, message, 'ERR_INTERNAL_SERVER', data);
  }
}

/**
 * Represents a 503 Service Unavailable error.
 */
export class ServiceUnavailableError extends HttpError {
  constructor(message = 'Service Unavailable') {
    super(503, message, 'ERR_SERVICE_UNAVAILABLE');
  }
}

import { ZodError } from 'zod';

import { Request, Response, NextFunction } from '@/config/http';
import logger from '@/lib/logger';

import { type AuthError, isAuthError } from '../errors/authErrors';
import {
  HttpError,
  BadRequestError,
  ForbiddenError,
  InternalServerError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
  ValidationError,
} from '../errors/httpErrors';

/**
 * Collapses an internal failure kind into what a client may see. Token
 * failure details (expired, malformed, bad signature...) stay in the logs.
 */
export function authErrorToHttp(error: AuthError): HttpError {
  switch (error.kind) {
    case 'Malformed':
    case 'BadSignature':
    case 'Expired':
    case 'NotYetValid':
    case 'TokenAlreadyUsed':
    case 'PrincipalInactive':
    case 'Unauthenticated':
      return new UnauthorizedError();
    case 'Forbidden':
      return new ForbiddenError();
    case 'RateLimited':
      return new TooManyRequestsError();
    case 'StoreUnavailable':
      return new ServiceUnavailableError();
    case 'ConfigError':
      return new InternalServerError();
  }
}

function toHttpError(err: Error): HttpError {
  if (err instanceof HttpError) return err;
  // Specific handling for Zod errors to provide better client feedback.
  if (err instanceof ZodError) {
    return new ValidationError(
      'Validation failed',
      err.errors.map((e) => e.message),
    );
  }
  if (isAuthError(err)) return authErrorToHttp(err);
  // body-parser marks malformed JSON with a 4xx status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return new BadRequestError('Malformed JSON body');
  }
  return new InternalServerError('An unexpected error occurred');
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error handlers by their four parameters
  _next: NextFunction,
): void => {
  const error = toHttpError(err);
  const production = process.env.NODE_ENV === 'production';

  const context = {
    err,
    kind: isAuthError(err) ? err.kind : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  };
  if (error.status >= 500) {
    logger.error(context, `Error occurred: ${err.message}`);
  } else {
    logger.info(context, `Request rejected: ${err.message}`);
  }

  if (error instanceof TooManyRequestsError) {
    res.setHeader('Retry-After', String(error.retryAfterSeconds));
  }

  res.status(error.status);
  if (error.status < 500) {
    res.jsend.fail({
      message: error.message,
      code: error.code,
      ...(error.data !== null && { details: error.data }),
    });
    return;
  }
  res.jsend.error({
    message: production && error.status === 500 ? 'Internal Server Error' : error.message,
    code: error.code,
  });
};

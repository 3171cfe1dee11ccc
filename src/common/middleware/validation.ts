import { type ZodTypeAny } from 'zod';

import { Request, Response, NextFunction } from '@/config/http';
import { ValidationError } from '../errors/httpErrors';

/**
 * Validates `req.body` against `schema` and replaces it with the parsed value.
 * Failures reach the error handler as a 422 listing the offending fields.
 */
export const validateRequest =
  (schema: ZodTypeAny) =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(new ValidationError('Validation failed', result.error.flatten().fieldErrors));
      return;
    }
    req.body = result.data;
    next();
  };

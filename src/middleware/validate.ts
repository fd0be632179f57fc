import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError } from 'zod';
import { ValidationError } from '../utils/errors';

/**
 * Parse `req.body` with `schema`, replacing it with the parsed value.
 * Failures are passed on as a ValidationError listing each issue.
 */
export function validate(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (err) {
      if (err instanceof ZodError) {
        const messages = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
        next(new ValidationError('Invalid request body', messages));
        return;
      }
      next(err);
    }
  };
}

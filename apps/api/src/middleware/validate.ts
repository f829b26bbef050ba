import type { AnyZodObject } from 'zod';
import { ZodError } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import { ValidationFailure } from '../utils/intakeErrors.js';

export function validate(
  schema: { body?: AnyZodObject; query?: AnyZodObject; params?: AnyZodObject }
) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schema.body)  req.body  = schema.body.parse(req.body);
      if (schema.query) req.query = schema.query.parse(req.query);
      if (schema.params) req.params = schema.params.parse(req.params);
      next();
    } catch (err) {
      if (err instanceof ZodError) {
        return next(new ValidationFailure('Request validation failed', err.flatten().fieldErrors));
      }
      next(err);
    }
  };
}

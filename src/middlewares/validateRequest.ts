import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils';

interface ValidationSchemas {
  body: ZodSchema;
}

/**
 * Middleware to validate the request body using a Zod schema.
 * The parsed value (defaults applied, unknown keys stripped) replaces req.body.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      req.body = await schemas.body.parseAsync(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(AppError.fromZodError('Validation failed', error));
      } else {
        next(error);
      }
    }
  };
};

export default validateRequest;

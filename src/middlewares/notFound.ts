import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils';

/**
 * Handle 404 - Route not found
 * Answered through the error handler, like every other failure.
 */
export const notFound = (req: Request, _res: Response, next: NextFunction): void => {
  next(AppError.notFound(`Route not found: ${req.method} ${req.originalUrl}`));
};

export default notFound;

import { Request, Response, NextFunction } from 'express';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Maps the errors express.json() raises for a bad body onto AppError.
 * Anything else passes through unchanged.
 */
const fromBodyParserError = (err: Error): Error => {
  if (!('type' in err)) return err;

  if (err.type === 'entity.parse.failed') {
    return AppError.badRequest('Malformed JSON body');
  }
  if (err.type === 'entity.too.large') {
    return AppError.payloadTooLarge();
  }
  return err;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  error: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const err = fromBodyParserError(error);

  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;
  let details: AppError['details'];

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
    details = err.details;
  }

  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(details && { details }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;

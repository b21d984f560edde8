import type { ZodError } from 'zod';

/**
 * A single failed check on client input
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: ValidationIssue[];

  constructor(message: string, statusCode: number, isOperational = true, details?: ValidationIssue[]) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string, details?: ValidationIssue[]): AppError {
    return new AppError(message, 400, true, details);
  }

  /**
   * 400 listing every failed check, e.g. "Validation failed: [{...}]"
   */
  static fromZodError(context: string, error: ZodError): AppError {
    const details = error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }));
    return AppError.badRequest(`${context}: ${JSON.stringify(details)}`, details);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static payloadTooLarge(message = 'Request body too large'): AppError {
    return new AppError(message, 413);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }
}

export default AppError;

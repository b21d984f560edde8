import { z } from 'zod';
import { AppError } from '../../src/utils/AppError';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 500, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 400);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 400);

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create bad request error', () => {
      const error = AppError.badRequest('Invalid input');

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Invalid input');
      expect(error.details).toBeUndefined();
    });

    it('should list every failed check of a zod error', () => {
      const schema = z.object({ query: z.string(), candidates: z.array(z.string()) });
      const result = schema.safeParse({ candidates: ['Jane Doe', 7] });
      if (result.success) throw new Error('expected validation to fail');

      const error = AppError.fromZodError('Validation failed', result.error);

      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual([
        { field: 'query', message: 'Required' },
        { field: 'candidates.1', message: 'Expected string, received number' },
      ]);
      expect(error.message).toBe(`Validation failed: ${JSON.stringify(error.details)}`);
    });

    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('Route not found: GET /names');

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Route not found: GET /names');
    });

    it('should create payload too large error', () => {
      const error = AppError.payloadTooLarge();

      expect(error.statusCode).toBe(413);
      expect(error.message).toBe('Request body too large');
    });

    it('should create internal error as non-operational', () => {
      const error = AppError.internal();

      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
    });
  });
});


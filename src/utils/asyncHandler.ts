import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Route handler whose body has already been checked by validateRequest
 */
export type ValidatedHandler<TBody> = (
  req: Request<Record<string, string>, unknown, TBody>,
  res: Response,
  next: NextFunction
) => unknown;

/**
 * Wraps a route handler so that a thrown error or a rejected promise
 * reaches the Express error handler.
 */
export const asyncHandler = <TBody = unknown>(fn: ValidatedHandler<TBody>): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
};

export default asyncHandler;

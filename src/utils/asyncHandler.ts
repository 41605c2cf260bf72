import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wraps an async route handler so a rejected promise reaches Express's error handler
 * instead of becoming an unhandled rejection.
 */
const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch((error: unknown) => {
      next(error);
    });
  };
};

export { asyncHandler };
export default asyncHandler;

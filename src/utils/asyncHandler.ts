import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Forward rejections from async route handlers to the Express error handler.
 * Handlers run inside the returned function so synchronous throws are forwarded too.
 */
export const asyncHandler = (fn: AsyncRoute): RequestHandler => {
  return (req, res, next) => {
    new Promise<unknown>((resolve) => resolve(fn(req, res, next))).catch(next);
  };
};

export default asyncHandler;

import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils';

/**
 * Unmatched routes become a 404 AppError for the global error handler
 */
export const notFound = (req: Request, _res: Response, next: NextFunction): void => {
  next(AppError.notFound(`Route not found: ${req.method} ${req.originalUrl}`));
};

export default notFound;

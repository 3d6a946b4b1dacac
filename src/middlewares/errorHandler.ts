import { Request, Response, NextFunction } from 'express';
import { AppError, logger, sendError, type ErrorKind } from '../utils';
import { env } from '../config';
import { REQUEST_ID_HEADER } from './requestLogger';

/**
 * Express body-parser failures carry status 400 and type "entity.parse.failed"
 */
const isMalformedBody = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;
  let kind: ErrorKind | undefined;

  // Check if it's our custom AppError
  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
    kind = err.kind;
  } else if (isMalformedBody(err)) {
    statusCode = 400;
    message = 'Malformed JSON body';
    isOperational = true;
  }

  const requestId = req.get(REQUEST_ID_HEADER) ?? '-';

  // Log error
  if (!isOperational) {
    logger.error(`[${requestId}] Unhandled Error:`, err);
  } else {
    logger.warn(`[${requestId}] Operational Error${kind ? ` [${kind}]` : ''}: ${message}`);
  }

  sendError(res, message, statusCode, {
    kind,
    stack: env.NODE_ENV === 'development' ? err.stack : undefined,
  });
};

export default errorHandler;

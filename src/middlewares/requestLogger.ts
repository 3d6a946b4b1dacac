import { Request, Response, NextFunction } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils';
import { env } from '../config';

export const REQUEST_ID_HEADER = 'x-request-id';

// Accept a caller's id only if it looks like one of ours or a tracing id
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{8,128}$/;

/**
 * Tags each request with an id, reusing the caller's X-Request-Id when valid.
 * The id is echoed back and prefixed to access and error logs.
 */
export const assignRequestId = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get(REQUEST_ID_HEADER);
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : uuidv4();

  req.headers[REQUEST_ID_HEADER] = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

morgan.token('request-id', (req) => {
  const value = req.headers[REQUEST_ID_HEADER];
  return typeof value === 'string' ? value : '-';
});

// Access logs go to winston at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

const FORMATS = {
  production:
    ':request-id :remote-addr ":method :url HTTP/:http-version" :status :res[content-length] - :response-time ms',
  development: ':request-id :method :url :status :response-time ms',
};

export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? FORMATS.production : FORMATS.development,
  { stream, skip: () => env.NODE_ENV === 'test' }
);

export default requestLogger;

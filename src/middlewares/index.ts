export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger, assignRequestId, REQUEST_ID_HEADER } from './requestLogger';
export { validateRequest, parseInput, commonSchemas } from './validateRequest';

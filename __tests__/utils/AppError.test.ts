import { AppError } from '../../src/utils/AppError';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
      expect(error.kind).toBeUndefined();
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
    });

    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource not found');
    });

    it('should create conflict error', () => {
      const error = AppError.conflict('Already exists');

      expect(error.statusCode).toBe(409);
      expect(error.message).toBe('Already exists');
    });

    it('should create internal error as non-operational', () => {
      const error = AppError.internal();

      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
    });
  });

  describe('error kinds', () => {
    it.each([
      [AppError.invalidQuery('bad'), 'InvalidQuery', 400],
      [AppError.staleReference(), 'StaleReference', 409],
      [AppError.rateLimited(), 'RateLimited', 429],
      [AppError.circuitOpen(), 'CircuitOpen', 503],
      [AppError.retriesExhausted('gave up', new Error('boom')), 'RetriesExhausted', 502],
      [AppError.cancelled(), 'Cancelled', 499],
    ])('should map %s to its kind and status', (error, kind, status) => {
      expect(error.kind).toBe(kind);
      expect(error.statusCode).toBe(status);
      expect(error.isOperational).toBe(true);
    });

    it('should keep the last failure as the cause of RetriesExhausted', () => {
      const cause = new Error('connection reset');
      const error = AppError.retriesExhausted('storage failed after 3 attempts', cause);

      expect(error.cause).toBe(cause);
    });

    it('should narrow with isKind', () => {
      expect(AppError.isKind(AppError.rateLimited(), 'RateLimited')).toBe(true);
      expect(AppError.isKind(AppError.circuitOpen(), 'RateLimited')).toBe(false);
      expect(AppError.isKind(new Error('plain'), 'RateLimited')).toBe(false);
    });
  });
});

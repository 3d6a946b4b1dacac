/**
 * Error kinds surfaced to callers.
 *
 * Matching-domain kinds (InvalidQuery, EmptyResult, StaleReference) describe
 * the user's input. Resilience-domain kinds (RateLimited, CircuitOpen,
 * RetriesExhausted, Cancelled) describe the state of an outbound provider and
 * are kept distinct so clients can tell "busy" from "down".
 */
export type ErrorKind =
  | 'InvalidQuery'
  | 'EmptyResult'
  | 'StaleReference'
  | 'RateLimited'
  | 'CircuitOpen'
  | 'RetriesExhausted'
  | 'Cancelled';

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly kind?: ErrorKind;

  constructor(
    message: string,
    statusCode: number,
    isOperational = true,
    kind?: ErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.kind = kind;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static conflict(message: string): AppError {
    return new AppError(message, 409);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }

  // ============================================
  // Typed error kinds
  // ============================================

  static invalidQuery(message: string): AppError {
    return new AppError(message, 400, true, 'InvalidQuery');
  }

  static staleReference(message = 'No pending selection matches this reference'): AppError {
    return new AppError(message, 409, true, 'StaleReference');
  }

  static rateLimited(message = 'Provider is busy, try again shortly'): AppError {
    return new AppError(message, 429, true, 'RateLimited');
  }

  static circuitOpen(message = 'Provider is temporarily unavailable'): AppError {
    return new AppError(message, 503, true, 'CircuitOpen');
  }

  static retriesExhausted(message: string, cause: unknown): AppError {
    return new AppError(message, 502, true, 'RetriesExhausted', { cause });
  }

  static cancelled(message = 'Request was cancelled'): AppError {
    return new AppError(message, 499, true, 'Cancelled');
  }

  /**
   * Narrow an unknown error to a given kind
   */
  static isKind(error: unknown, kind: ErrorKind): error is AppError {
    return error instanceof AppError && error.kind === kind;
  }
}

export default AppError;

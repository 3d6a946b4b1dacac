/**
 * Failure Classification
 *
 * Transient failures are worth retrying: timeouts, overload, 5xx and
 * connection-level errors. Permanent failures (validation, other 4xx) will
 * fail the same way again and are returned to the caller at once.
 *
 * Constraint violations from the store are permanent.
 * Errors with no recognizable shape are treated as transient.
 */

import { ZodError } from 'zod';
import type { FailureClass } from './types';

/**
 * Raised when a single attempt exceeds its time budget
 */
export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
    Object.setPrototypeOf(this, AttemptTimeoutError.prototype);
  }
}

const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([408, 429]);

/**
 * Reads an HTTP-like status from common error shapes
 * (status, statusCode, response.status)
 */
export function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Classifies a failed attempt.
 *
 * @example
 * classifyFailure(new AttemptTimeoutError(1000))   // 'transient'
 * classifyFailure({ status: 503 })                 // 'transient'
 * classifyFailure({ status: 422 })                 // 'permanent'
 * classifyFailure(Object.assign(new Error(), { code: 'ECONNRESET' })) // 'transient'
 */
export function classifyFailure(error: unknown): FailureClass {
  if (error instanceof AttemptTimeoutError) {
    return 'transient';
  }

  if (error instanceof ZodError) {
    return 'permanent';
  }

  const status = readStatusCode(error);
  if (status !== undefined) {
    if (TRANSIENT_STATUS_CODES.has(status) || status >= 500) {
      return 'transient';
    }
    if (status >= 400) {
      return 'permanent';
    }
  }

  const code = readErrorCode(error);
  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return 'transient';
  }
  if (code !== undefined && code.startsWith('SQLITE_CONSTRAINT')) {
    return 'permanent';
  }

  return 'transient';
}

export default classifyFailure;

import { Response } from 'express';
import { ApiResponse } from '../types';
import type { ErrorKind } from './AppError';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

export interface ErrorResponseOptions {
  kind?: ErrorKind;
  /** Only sent in development */
  stack?: string;
}

/**
 * Send an error response. Fields left undefined are dropped from the JSON.
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  options: ErrorResponseOptions = {}
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    kind: options.kind,
    stack: options.stack,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

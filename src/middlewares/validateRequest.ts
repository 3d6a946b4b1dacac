import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodType, ZodTypeDef } from 'zod';
import { AppError } from '../utils';

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

interface ValidationSchemas {
  body?: Schema<unknown>;
  params?: Schema<unknown>;
  query?: Schema<unknown>;
}

const describeZodError = (error: ZodError): string =>
  JSON.stringify(
    error.errors.map((err) => ({
      field: err.path.join('.'),
      message: err.message,
    }))
  );

/**
 * Parses one part of a request, throwing a 400 on failure
 *
 * @example
 * const { userId } = parseInput(commonSchemas.userParams, req.params);
 */
export function parseInput<T>(schema: Schema<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw AppError.badRequest(`Validation failed: ${describeZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Middleware to validate request body, query, and params using Zod schemas.
 * Rejects before the handler runs; handlers read typed values with parseInput.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if (schemas.params) parseInput(schemas.params, req.params);
      if (schemas.query) parseInput(schemas.query, req.query);
      if (schemas.body) parseInput(schemas.body, req.body);
      next();
    } catch (error) {
      next(error);
    }
  };
};

// Common validation schemas
const identifier = (label: string) =>
  z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, `Invalid ${label} format`);

export const commonSchemas = {
  identifier,
  userParams: z.object({ userId: identifier('user ID') }),
  sessionParams: z.object({
    userId: identifier('user ID'),
    sessionId: identifier('session ID'),
  }),
};

export default validateRequest;

/**
 * Match Query Validation
 *
 * Turns untrusted input into a MatchQuery before any scoring or storage
 * access happens. Failures are returned as a typed result, never thrown.
 */

import { z } from 'zod';
import { parseCalendarDate } from './dateProximity';
import type { MatchQuery } from './types';

export interface QueryIssue {
  field: string;
  message: string;
}

export interface InvalidQuery {
  kind: 'InvalidQuery';
  issues: QueryIssue[];
}

export type QueryValidationResult =
  | { success: true; data: MatchQuery }
  | { success: false; error: InvalidQuery };

// ============================================
// Schema
// ============================================

const amountSchema = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value.trim()) : value),
  z
    .number({ invalid_type_error: 'amount must be a number' })
    .finite('amount must be a finite number')
    .nonnegative('amount cannot be negative')
);

const dateSchema = z
  .string({ invalid_type_error: 'date must be a YYYY-MM-DD string' })
  .transform((value, ctx) => {
    const date = parseCalendarDate(value.trim());
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'date must be a valid YYYY-MM-DD date' });
      return z.NEVER;
    }
    return date;
  });

const textSchema = (field: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} cannot be empty`);

export const matchQuerySchema = z
  .object({
    amount: amountSchema.optional(),
    date: dateSchema.optional(),
    merchantText: textSchema('merchantText').optional(),
    transactionId: textSchema('transactionId').optional(),
  })
  .strict()
  .superRefine((query, ctx) => {
    const populated = [query.amount, query.date, query.merchantText, query.transactionId].some(
      (value) => value !== undefined
    );
    if (!populated) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'At least one of amount, date, merchantText or transactionId is required',
      });
    }
  });

// ============================================
// Validation
// ============================================

/**
 * Validates a raw query.
 *
 * @example
 * validateMatchQuery({ amount: '50.00', merchantText: 'Coffee Palace' })
 * // Returns: { success: true, data: { amount: 50, merchantText: 'Coffee Palace' } }
 *
 * validateMatchQuery({})
 * // Returns: { success: false, error: { kind: 'InvalidQuery', issues: [...] } }
 */
export function validateMatchQuery(raw: unknown): QueryValidationResult {
  const parsed = matchQuerySchema.safeParse(raw ?? {});

  if (!parsed.success) {
    return {
      success: false,
      error: {
        kind: 'InvalidQuery',
        issues: parsed.error.errors.map((issue) => ({
          field: issue.path.join('.') || 'query',
          message: issue.message,
        })),
      },
    };
  }

  const query: MatchQuery = {};
  if (parsed.data.amount !== undefined) query.amount = parsed.data.amount;
  if (parsed.data.date !== undefined) query.date = parsed.data.date;
  if (parsed.data.merchantText !== undefined) query.merchantText = parsed.data.merchantText;
  if (parsed.data.transactionId !== undefined) query.transactionId = parsed.data.transactionId;

  return { success: true, data: query };
}

/**
 * Stable identity of a query, used to tag pending disambiguation state
 */
export function fingerprintQuery(query: MatchQuery): string {
  return JSON.stringify([
    query.amount ?? null,
    query.date ? query.date.toISOString().slice(0, 10) : null,
    query.merchantText?.toLowerCase() ?? null,
    query.transactionId ?? null,
  ]);
}

export default validateMatchQuery;

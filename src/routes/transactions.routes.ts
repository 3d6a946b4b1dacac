/**
 * Transaction API Routes
 *
 * Read-only access to one user's transactions. Mounted under
 * /users/:userId/transactions.
 *
 * Endpoints:
 * - GET /      - Search with optional filters
 * - GET /:transactionId - Transaction details with merchant info
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess } from '../utils';
import { commonSchemas, parseInput, validateRequest } from '../middlewares';
import { parseCalendarDate } from '../matching/dateProximity';
import { searchTransactions, getTransactionDetails } from '../services/transaction.service';

const router = Router({ mergeParams: true });

export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 50;

// ============================================
// Validation Schemas
// ============================================

const searchQuerySchema = z.object({
  amount: z.coerce
    .number({ invalid_type_error: 'amount must be a number' })
    .finite()
    .nonnegative()
    .optional(),
  date: z
    .string()
    .transform((value, ctx) => {
      const date = parseCalendarDate(value.trim());
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'date must be a valid YYYY-MM-DD date' });
        return z.NEVER;
      }
      return date;
    })
    .optional(),
  merchant: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).optional(),
  status: z.enum(['pending', 'posted', 'refunded']).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT),
});

const detailParamsSchema = commonSchemas.userParams.extend({
  transactionId: commonSchemas.identifier('transaction ID'),
});

// ============================================
// Routes
// ============================================

/**
 * @route   GET /api/v1/users/:userId/transactions
 * @desc    Search a user's transactions
 * @access  Agent
 *
 * Query params:
 * - amount: number (optional, within the configured tolerance)
 * - date: YYYY-MM-DD (optional, within the configured day tolerance)
 * - merchant: string (optional, name or alias, partial matches allowed)
 * - category: string (optional)
 * - status: pending | posted | refunded (optional)
 * - limit: number (optional, default: 10, max: 50)
 *
 * Response:
 * - 200 OK: { transactions: [], count, totalShown, message }
 */
router.get(
  '/',
  validateRequest({ params: commonSchemas.userParams, query: searchQuerySchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId } = parseInput(commonSchemas.userParams, req.params);
    const { merchant, ...filters } = parseInput(searchQuerySchema, req.query);

    const result = await searchTransactions(userId, { ...filters, merchantName: merchant });

    sendSuccess(res, result, result.message);
  })
);

/**
 * @route   GET /api/v1/users/:userId/transactions/:transactionId
 * @desc    Transaction details with merchant info
 * @access  Agent
 *
 * Response:
 * - 200 OK: { transaction, merchant }
 * - 404 Not Found: Not one of the user's transactions
 */
router.get(
  '/:transactionId',
  validateRequest({ params: detailParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId, transactionId } = parseInput(detailParamsSchema, req.params);

    const details = await getTransactionDetails(userId, transactionId);

    sendSuccess(res, details, 'Transaction retrieved successfully');
  })
);

export default router;

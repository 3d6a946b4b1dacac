/**
 * Dispute API Routes
 *
 * Mounted under /users/:userId/disputes.
 *
 * IMPORTANT: Flagging writes an audit event.
 *
 * Endpoints:
 * - POST /            - Flag a transaction for dispute review
 * - GET  /            - List the user's disputes
 * - GET  /:disputeId  - Dispute status with its transaction
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess } from '../utils';
import { commonSchemas, parseInput, validateRequest } from '../middlewares';
import { flagDispute, getDispute, listDisputes } from '../services/dispute.service';

const router = Router({ mergeParams: true });

// ============================================
// Validation Schemas
// ============================================

const flagDisputeSchema = z.object({
  transactionId: commonSchemas.identifier('transaction ID'),
  complaint: z
    .string({ required_error: 'complaint is required' })
    .trim()
    .min(1, 'complaint cannot be empty')
    .max(2000, 'complaint is too long'),
});

const disputeParamsSchema = commonSchemas.userParams.extend({
  disputeId: z.string().uuid('Invalid dispute ID format'),
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /api/v1/users/:userId/disputes
 * @desc    Flag a transaction for dispute review
 * @access  Agent
 *
 * Response:
 * - 201 Created: { dispute, transaction, message, nextSteps }
 * - 404 Not Found: Not one of the user's transactions
 * - 409 Conflict: The transaction already has an open dispute
 */
router.post(
  '/',
  validateRequest({ params: commonSchemas.userParams, body: flagDisputeSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId } = parseInput(commonSchemas.userParams, req.params);
    const body = parseInput(flagDisputeSchema, req.body);

    const result = await flagDispute(userId, body);

    sendSuccess(res, result, result.message, 201);
  })
);

/**
 * @route   GET /api/v1/users/:userId/disputes
 * @desc    The user's disputes, newest first
 * @access  Agent
 */
router.get(
  '/',
  validateRequest({ params: commonSchemas.userParams }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId } = parseInput(commonSchemas.userParams, req.params);

    const disputes = await listDisputes(userId);

    sendSuccess(res, { disputes, count: disputes.length }, `Found ${disputes.length} disputes`);
  })
);

/**
 * @route   GET /api/v1/users/:userId/disputes/:disputeId
 * @desc    Dispute status with its transaction
 * @access  Agent
 *
 * Response:
 * - 200 OK: { dispute, transaction }
 * - 404 Not Found: Dispute not found for this user
 */
router.get(
  '/:disputeId',
  validateRequest({ params: disputeParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId, disputeId } = parseInput(disputeParamsSchema, req.params);

    const result = await getDispute(userId, disputeId);

    sendSuccess(res, result, 'Dispute retrieved successfully');
  })
);

export default router;

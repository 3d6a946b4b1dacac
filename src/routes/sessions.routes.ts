/**
 * Resolution Session Routes
 *
 * Conversation turns for resolving which transaction a user means.
 * Mounted under /users/:userId/sessions.
 *
 * Endpoints:
 * - POST   /:sessionId/resolve - Resolve a structured query
 * - POST   /:sessionId/select  - Answer a clarification request
 * - DELETE /:sessionId         - End the session
 */

import { Router, Request, Response } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { commonSchemas, parseInput, validateRequest } from '../middlewares';
import { resolutionService } from '../services/resolution.service';

const router = Router({ mergeParams: true });

/**
 * @route   POST /api/v1/users/:userId/sessions/:sessionId/resolve
 * @desc    Rank the user's transactions against a query
 * @access  Agent
 *
 * Request body (at least one field):
 * - amount: number
 * - date: YYYY-MM-DD
 * - merchantText: string
 * - transactionId: string
 *
 * Response:
 * - 200 OK: resolution response (outcome unique | ambiguous | empty)
 * - 400 Bad Request: InvalidQuery
 * - 429 / 502 / 503: provider busy, exhausted or unavailable
 */
router.post(
  '/:sessionId/resolve',
  validateRequest({ params: commonSchemas.sessionParams }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId, sessionId } = parseInput(commonSchemas.sessionParams, req.params);

    const result = await resolutionService.resolve(userId, sessionId, req.body);

    sendSuccess(res, result, result.message);
  })
);

/**
 * @route   POST /api/v1/users/:userId/sessions/:sessionId/select
 * @desc    Answer the pending clarification
 * @access  Agent
 *
 * Request body (exactly one):
 * - transactionId: string
 * - rank: number (1-based reference from the clarification)
 * - query: object (refined query, ranked against the pending candidates)
 *
 * Response:
 * - 200 OK: resolution response
 * - 400 Bad Request: InvalidQuery
 * - 409 Conflict: StaleReference
 */
router.post(
  '/:sessionId/select',
  validateRequest({ params: commonSchemas.sessionParams }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId, sessionId } = parseInput(commonSchemas.sessionParams, req.params);

    const result = await resolutionService.select(userId, sessionId, req.body);

    sendSuccess(res, result, result.message);
  })
);

/**
 * @route   DELETE /api/v1/users/:userId/sessions/:sessionId
 * @desc    End a session and cancel its in-flight calls
 * @access  Agent
 */
router.delete(
  '/:sessionId',
  validateRequest({ params: commonSchemas.sessionParams }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { userId, sessionId } = parseInput(commonSchemas.sessionParams, req.params);

    const result = resolutionService.endSession(userId, sessionId);

    sendSuccess(res, result, result.ended ? 'Session ended' : 'No active session');
  })
);

export default router;

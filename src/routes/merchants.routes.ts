/**
 * Merchant API Routes
 *
 * Endpoints:
 * - GET /search?name= - Find merchants by name or statement alias
 * - GET /:merchantId  - Merchant info
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, sendSuccess } from '../utils';
import { commonSchemas, parseInput, validateRequest } from '../middlewares';
import { getMerchant, searchMerchants } from '../services/merchant.service';

const router = Router();

const searchQuerySchema = z.object({
  name: z.string({ required_error: 'name is required' }).trim().min(1, 'name cannot be empty'),
});

const merchantParamsSchema = z.object({
  merchantId: commonSchemas.identifier('merchant ID'),
});

/**
 * @route   GET /api/v1/merchants/search
 * @desc    Search merchants; suggests close names when nothing matches
 * @access  Agent
 *
 * Response:
 * - 200 OK: { found, count, merchants, suggestions, message }
 */
router.get(
  '/search',
  validateRequest({ query: searchQuerySchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { name } = parseInput(searchQuerySchema, req.query);

    const result = await searchMerchants(name);

    sendSuccess(res, result, result.message);
  })
);

/**
 * @route   GET /api/v1/merchants/:merchantId
 * @desc    Merchant info
 * @access  Agent
 *
 * Response:
 * - 200 OK: Merchant object
 * - 404 Not Found: Merchant not found
 */
router.get(
  '/:merchantId',
  validateRequest({ params: merchantParamsSchema }),
  asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { merchantId } = parseInput(merchantParamsSchema, req.params);

    const merchant = await getMerchant(merchantId);

    sendSuccess(res, merchant, 'Merchant retrieved successfully');
  })
);

export default router;

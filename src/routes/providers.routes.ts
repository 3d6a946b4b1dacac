import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /api/v1/providers
 * @desc    Circuit and rate-limit state per outbound provider
 * @access  Public
 *
 * Response:
 * - 200 OK: { healthy, providers, openCircuits }
 */
router.get('/', healthController.getProviders);

export default router;

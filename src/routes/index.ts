import { Router } from 'express';
import healthRoutes from './health.routes';
import providersRoutes from './providers.routes';
import merchantsRoutes from './merchants.routes';
import transactionsRoutes from './transactions.routes';
import sessionsRoutes from './sessions.routes';
import disputesRoutes from './disputes.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Outbound provider status (circuit + rate limit)
router.use('/providers', providersRoutes);

// Merchant lookup
router.use('/merchants', merchantsRoutes);

// User-scoped routes
router.use('/users/:userId/transactions', transactionsRoutes);
router.use('/users/:userId/sessions', sessionsRoutes);
router.use('/users/:userId/disputes', disputesRoutes);

export default router;

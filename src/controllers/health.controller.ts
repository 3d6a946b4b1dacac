import { Request, Response } from 'express';
import { healthService, type HealthService } from '../services/health.service';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health, readiness and provider status endpoints
 */
export class HealthController {
  constructor(private readonly health: HealthService = healthService) {}

  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, this.health.getHealthStatus(), 'Service is healthy');
  });

  /**
   * 503 names the failing checks, e.g. "Service is not ready: database, providers"
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const report = await this.health.checkReadiness();

    if (!report.ready) {
      sendError(res, `Service is not ready: ${report.failing.join(', ')}`, 503);
      return;
    }

    sendSuccess(res, report, 'Service is ready');
  });

  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });

  /**
   * Circuit and rate-limit state per outbound provider
   */
  getProviders = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const report = this.health.getProviderReport();

    const message =
      report.openCircuits.length > 0
        ? `${report.providers.length} providers registered, open: ${report.openCircuits.join(', ')}`
        : `${report.providers.length} providers registered`;

    sendSuccess(res, report, message);
  });
}

export const healthController = new HealthController();

export default healthController;

import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { checkDatabaseHealth } from '../database';
import { isRedisAvailable } from '../redis';
import { resilienceGateway, type ProviderStatus, type ResilienceGateway } from '../resilience';

export type ReadinessCheck = 'server' | 'database' | 'providers';

export interface ReadinessReport {
  ready: boolean;
  checks: Record<ReadinessCheck, boolean>;
  /** Checks that failed, in a fixed order */
  failing: ReadinessCheck[];
  /** Redis is optional and never affects readiness */
  cache: 'connected' | 'disabled' | 'unavailable';
}

export interface ProviderReport {
  healthy: boolean;
  providers: ProviderStatus[];
  openCircuits: string[];
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor(private readonly gateway: ResilienceGateway = resilienceGateway) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Ready when the database answers and no provider circuit is open
   */
  async checkReadiness(): Promise<ReadinessReport> {
    const checks: Record<ReadinessCheck, boolean> = {
      server: true,
      database: await checkDatabaseHealth(),
      providers: this.gateway.isHealthy(),
    };

    const order: ReadinessCheck[] = ['server', 'database', 'providers'];
    const failing = order.filter((check) => !checks[check]);

    return {
      ready: failing.length === 0,
      checks,
      failing,
      cache: this.cacheState(),
    };
  }

  getProviderReport(): ProviderReport {
    const providers = this.gateway.getProviderStatus();

    return {
      healthy: this.gateway.isHealthy(),
      providers,
      openCircuits: providers
        .filter((provider) => provider.circuit.status === 'open')
        .map((provider) => provider.providerId),
    };
  }

  private cacheState(): ReadinessReport['cache'] {
    if (!env.REDIS_HOST) {
      return 'disabled';
    }
    return isRedisAvailable() ? 'connected' : 'unavailable';
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;

/**
 * Resilience Gateway
 *
 * The single entry point for outbound calls: execute(providerId, operation).
 * Each provider gets its own circuit breaker, token bucket and retry
 * executor, created on first use from the default policy unless registered
 * with a policy of its own.
 *
 * Breakers and buckets are process-wide and shared by every session.
 */

import { resilienceConfig } from '../config';
import { logger } from '../utils';
import { CircuitBreaker, type CircuitStatistics } from './circuitBreaker';
import { TokenBucket } from './tokenBucket';
import { RetryExecutor } from './retryExecutor';
import type { Clock, ExecuteOptions, Operation, ProviderPolicy, Sleeper } from './types';

export const PROVIDERS = {
  /** External reasoning model called by the agent layer */
  REASONING: 'reasoning',
  /** Transaction and merchant store */
  STORAGE: 'storage',
} as const;

export interface GatewayDependencies {
  clock?: Clock;
  sleep?: Sleeper;
  random?: () => number;
}

export interface ProviderResilience {
  breaker: CircuitBreaker;
  bucket: TokenBucket;
  executor: RetryExecutor;
}

export interface ProviderStatus {
  providerId: string;
  circuit: CircuitStatistics;
  rateLimit: { capacity: number; tokens: number };
}

export class ResilienceGateway {
  private readonly providers = new Map<string, ProviderResilience>();

  constructor(
    private readonly defaultPolicy: ProviderPolicy,
    private readonly dependencies: GatewayDependencies = {}
  ) {}

  /**
   * Creates (or replaces) the resilience stack for a provider
   */
  register(providerId: string, policy: ProviderPolicy = this.defaultPolicy): ProviderResilience {
    const { clock, sleep, random } = this.dependencies;

    const breaker = new CircuitBreaker(providerId, policy.circuit, clock);
    const bucket = new TokenBucket(providerId, policy.rateLimit, clock, sleep);
    const executor = new RetryExecutor(providerId, policy.retry, breaker, bucket, { sleep, random });

    const stack = { breaker, bucket, executor };
    this.providers.set(providerId, stack);

    logger.debug(
      `Resilience registered for ${providerId}: ${policy.rateLimit.capacity} tokens, ` +
        `breaker at ${policy.circuit.failureThreshold} failures, ${policy.retry.maxAttempts} attempts`
    );

    return stack;
  }

  provider(providerId: string): ProviderResilience {
    return this.providers.get(providerId) ?? this.register(providerId);
  }

  /**
   * Runs an outbound call through the provider's breaker, limiter and retries
   */
  execute<T>(providerId: string, operation: Operation<T>, options: ExecuteOptions = {}): Promise<T> {
    return this.provider(providerId).executor.execute(operation, options);
  }

  getProviderStatus(): ProviderStatus[] {
    return [...this.providers.entries()].map(([providerId, stack]) => ({
      providerId,
      circuit: stack.breaker.getStatistics(),
      rateLimit: stack.bucket.getStatus(),
    }));
  }

  /**
   * True unless some provider's circuit is open
   */
  isHealthy(): boolean {
    return [...this.providers.values()].every((stack) => stack.breaker.getState().status !== 'open');
  }
}

const createDefaultGateway = (): ResilienceGateway => {
  const gateway = new ResilienceGateway(resilienceConfig);
  gateway.register(PROVIDERS.REASONING);
  gateway.register(PROVIDERS.STORAGE);
  return gateway;
};

// Singleton instance
export const resilienceGateway = createDefaultGateway();

export default resilienceGateway;

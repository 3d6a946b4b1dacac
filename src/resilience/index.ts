/**
 * Outbound Resilience
 *
 * Every call to an external provider goes through
 * resilienceGateway.execute(providerId, operation).
 */

export { resilienceGateway, ResilienceGateway, PROVIDERS } from './gateway';
export type { ProviderResilience, ProviderStatus, GatewayDependencies } from './gateway';
export { CircuitBreaker } from './circuitBreaker';
export type { CircuitStatistics } from './circuitBreaker';
export { transitionCircuit, initialCircuitState, timeUntilTrial } from './circuitTransition';
export { TokenBucket, refillBucket, reserveToken } from './tokenBucket';
export { RetryExecutor } from './retryExecutor';
export { classifyFailure, AttemptTimeoutError, readStatusCode } from './classifyFailure';
export { sleep } from './sleep';
export type {
  CircuitState,
  CircuitStatus,
  CircuitOptions,
  CircuitPermit,
  TokenBucketState,
  TokenBucketOptions,
  RetryOptions,
  ProviderPolicy,
  FailureClass,
  Operation,
  ExecuteOptions,
} from './types';

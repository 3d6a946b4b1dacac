/**
 * Type Definitions for the outbound resilience layer
 */

export type Clock = () => number;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

// ============================================
// Circuit breaker
// ============================================

export type CircuitStatus = 'closed' | 'open' | 'half_open';

export interface CircuitState {
  status: CircuitStatus;
  consecutiveFailures: number;
  /** Epoch milliseconds of the last transition to open */
  openedAt: number | null;
  /** True while the single half-open trial call is outstanding */
  trialInFlight: boolean;
}

export interface CircuitOptions {
  failureThreshold: number;
  openDurationMs: number;
}

/**
 * A call's admission. trial marks the one call allowed through while half-open.
 */
export interface CircuitPermit {
  trial: boolean;
}

export type CircuitEvent =
  | { type: 'request' }
  | { type: 'success'; trial: boolean }
  | { type: 'failure'; trial: boolean }
  | { type: 'abandon'; trial: boolean };

export type CircuitAdmission = 'pass' | 'trial' | 'reject';

export interface CircuitTransition {
  state: CircuitState;
  /** Set for request events only */
  admission: CircuitAdmission | null;
}

// ============================================
// Token bucket
// ============================================

export interface TokenBucketState {
  capacity: number;
  /** May go negative while callers wait on reserved tokens */
  tokens: number;
  refillRatePerMs: number;
  lastRefillTime: number;
}

export interface TokenBucketOptions {
  capacity: number;
  refillPerMs: number;
  /** Longest a caller may be held waiting for a token */
  maxWaitMs: number;
}

// ============================================
// Retry
// ============================================

export type FailureClass = 'transient' | 'permanent';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxJitterMs: number;
  attemptTimeoutMs: number;
}

export interface ProviderPolicy {
  rateLimit: TokenBucketOptions;
  circuit: CircuitOptions;
  retry: RetryOptions;
}

export type Operation<T> = (signal: AbortSignal) => Promise<T>;

export interface ExecuteOptions {
  /** Aborting stops waiting, backoff and the in-flight attempt */
  signal?: AbortSignal;
}

/**
 * Retry Executor
 *
 * Runs one logical outbound call with bounded exponential backoff.
 *
 * Per attempt:
 * 1. Circuit breaker admission. A rejection ends the call with CircuitOpen
 *    and uses neither an attempt nor a token.
 * 2. Token bucket admission (may wait, may fail with RateLimited).
 * 3. The call itself, aborted after attemptTimeoutMs.
 *
 * Transient failures are reported to the breaker and retried after
 * baseDelayMs × 2^(n-1) + jitter. Permanent failures are returned as they
 * are. After maxAttempts the last failure is wrapped in RetriesExhausted.
 *
 * Aborting the caller's signal ends the call with Cancelled. The breaker
 * permit is released without recording an outcome and consumed tokens are
 * kept.
 */

import { AppError, logger } from '../utils';
import { AttemptTimeoutError, classifyFailure } from './classifyFailure';
import { sleep as defaultSleep } from './sleep';
import type { CircuitBreaker } from './circuitBreaker';
import type { TokenBucket } from './tokenBucket';
import type { ExecuteOptions, Operation, RetryOptions, Sleeper } from './types';

export interface RetryDependencies {
  sleep?: Sleeper;
  /** Returns a value in [0, 1) */
  random?: () => number;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class RetryExecutor {
  private readonly sleeper: Sleeper;
  private readonly random: () => number;

  constructor(
    public readonly providerId: string,
    private readonly options: RetryOptions,
    private readonly breaker: CircuitBreaker,
    private readonly bucket: TokenBucket,
    dependencies: RetryDependencies = {}
  ) {
    this.sleeper = dependencies.sleep ?? defaultSleep;
    this.random = dependencies.random ?? Math.random;
  }

  /**
   * Delay before the attempt following failed attempt n (1-based)
   */
  backoffDelay(attempt: number): number {
    const jitter = Math.floor(this.random() * this.options.maxJitterMs);
    return this.options.baseDelayMs * 2 ** (attempt - 1) + jitter;
  }

  async execute<T>(operation: Operation<T>, options: ExecuteOptions = {}): Promise<T> {
    const { signal } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw AppError.cancelled(`${this.providerId} call cancelled`);
      }

      const permit = this.breaker.request();

      try {
        await this.bucket.acquire(signal);
      } catch (error) {
        this.breaker.abandon(permit);
        throw this.cancelledOr(error, signal);
      }

      if (signal?.aborted) {
        this.breaker.abandon(permit);
        throw AppError.cancelled(`${this.providerId} call cancelled`);
      }

      try {
        const value = await this.runAttempt(operation, signal);
        this.breaker.recordSuccess(permit);
        return value;
      } catch (error) {
        if (signal?.aborted) {
          this.breaker.abandon(permit);
          throw AppError.cancelled(`${this.providerId} call cancelled`);
        }

        if (classifyFailure(error) === 'permanent') {
          // The provider answered; the request itself was at fault
          this.breaker.recordSuccess(permit);
          throw error;
        }

        this.breaker.recordFailure(permit);
        lastError = error;
        logger.warn(
          `${this.providerId} attempt ${attempt}/${this.options.maxAttempts} failed: ${describeError(error)}`
        );
      }

      if (attempt < this.options.maxAttempts) {
        await this.backoff(attempt, signal);
      }
    }

    throw AppError.retriesExhausted(
      `${this.providerId} failed after ${this.options.maxAttempts} attempts: ${describeError(lastError)}`,
      lastError
    );
  }

  // ============================================
  // Internals
  // ============================================

  private async backoff(attempt: number, signal?: AbortSignal): Promise<void> {
    const delayMs = this.backoffDelay(attempt);
    logger.debug(`${this.providerId} retrying in ${delayMs}ms`);

    try {
      await this.sleeper(delayMs, signal);
    } catch (error) {
      throw this.cancelledOr(error, signal);
    }
  }

  /**
   * Runs one attempt under its own abort signal, linked to the caller's and
   * to the attempt timeout. Settles as soon as either fires, even if the
   * operation ignores its signal.
   */
  private async runAttempt<T>(operation: Operation<T>, callerSignal?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new AttemptTimeoutError(this.options.attemptTimeoutMs)),
      this.options.attemptTimeoutMs
    );
    const forwardAbort = (): void => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      return await new Promise<T>((resolve, reject) => {
        controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
          once: true,
        });
        operation(controller.signal).then(resolve, reject);
      });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  private cancelledOr(error: unknown, signal?: AbortSignal): unknown {
    return signal?.aborted ? AppError.cancelled(`${this.providerId} call cancelled`) : error;
  }
}

export default RetryExecutor;

/**
 * Token Bucket Rate Limiter
 *
 * Continuous refill: `capacity` tokens per window, credited in proportion to
 * elapsed time and capped at capacity.
 *
 * A caller that finds no whole token reserves the next one by taking the
 * balance below zero, then sleeps exactly until that token has refilled.
 * Two waiters therefore never target the same token and no re-check loop is
 * needed. A reserved token is not refunded if its caller goes away.
 */

import { AppError } from '../utils';
import { sleep as defaultSleep } from './sleep';
import type { Clock, Sleeper, TokenBucketOptions, TokenBucketState } from './types';

// ============================================
// Pure bucket arithmetic
// ============================================

/**
 * Credits tokens for the time elapsed since the last refill
 */
export const refillBucket = (state: TokenBucketState, now: number): TokenBucketState => {
  const elapsed = now - state.lastRefillTime;
  if (elapsed <= 0) {
    return state;
  }

  return {
    ...state,
    tokens: Math.min(state.capacity, state.tokens + elapsed * state.refillRatePerMs),
    lastRefillTime: now,
  };
};

export type Reservation =
  | { admitted: true; state: TokenBucketState; waitMs: number }
  | { admitted: false; state: TokenBucketState; waitMs: number };

/**
 * Takes one token now, or reserves the next one if the wait is acceptable
 */
export const reserveToken = (
  state: TokenBucketState,
  now: number,
  maxWaitMs: number
): Reservation => {
  const refilled = refillBucket(state, now);

  if (refilled.tokens >= 1) {
    return { admitted: true, state: { ...refilled, tokens: refilled.tokens - 1 }, waitMs: 0 };
  }

  const waitMs = (1 - refilled.tokens) / refilled.refillRatePerMs;
  if (waitMs > maxWaitMs) {
    return { admitted: false, state: refilled, waitMs };
  }

  return { admitted: true, state: { ...refilled, tokens: refilled.tokens - 1 }, waitMs };
};

// ============================================
// Shared limiter
// ============================================

export class TokenBucket {
  private state: TokenBucketState;

  constructor(
    public readonly providerId: string,
    private readonly options: TokenBucketOptions,
    private readonly clock: Clock = Date.now,
    private readonly sleeper: Sleeper = defaultSleep
  ) {
    this.state = {
      capacity: options.capacity,
      tokens: options.capacity,
      refillRatePerMs: options.refillPerMs,
      lastRefillTime: clock(),
    };
  }

  /**
   * Waits for admission.
   *
   * @throws AppError RateLimited when the wait would exceed maxWaitMs
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const reservation = reserveToken(this.state, this.clock(), this.options.maxWaitMs);
    this.state = reservation.state;

    if (!reservation.admitted) {
      throw AppError.rateLimited(
        `${this.providerId} rate limit reached, next slot in ${Math.ceil(reservation.waitMs)}ms`
      );
    }

    if (reservation.waitMs > 0) {
      await this.sleeper(reservation.waitMs, signal);
    }
  }

  getStatus(): { capacity: number; tokens: number } {
    this.state = refillBucket(this.state, this.clock());
    return { capacity: this.state.capacity, tokens: this.state.tokens };
  }
}

export default TokenBucket;

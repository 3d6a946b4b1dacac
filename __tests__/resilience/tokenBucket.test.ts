/**
 * Tests for the Token Bucket rate limiter
 */

import { refillBucket, reserveToken, TokenBucket } from '../../src/resilience/tokenBucket';

// 10 tokens per second
const RATE_PER_MS = 0.01;

describe('refillBucket', () => {
  const state = { capacity: 5, tokens: 1, refillRatePerMs: RATE_PER_MS, lastRefillTime: 0 };

  it('should credit tokens for elapsed time', () => {
    expect(refillBucket(state, 200).tokens).toBeCloseTo(3);
  });

  it('should cap at capacity', () => {
    expect(refillBucket(state, 60_000).tokens).toBe(5);
  });

  it('should leave the state alone when no time has passed', () => {
    expect(refillBucket(state, 0)).toBe(state);
  });
});

describe('reserveToken', () => {
  const empty = { capacity: 5, tokens: 0, refillRatePerMs: RATE_PER_MS, lastRefillTime: 0 };

  it('should take a whole token without waiting', () => {
    const reservation = reserveToken({ ...empty, tokens: 2 }, 0, 0);

    expect(reservation.admitted).toBe(true);
    expect(reservation.waitMs).toBe(0);
    expect(reservation.state.tokens).toBe(1);
  });

  it('should reserve the next token and report the wait', () => {
    const reservation = reserveToken(empty, 0, 1_000);

    expect(reservation.admitted).toBe(true);
    expect(reservation.waitMs).toBeCloseTo(100);
    expect(reservation.state.tokens).toBe(-1);
  });

  it('should give consecutive waiters distinct slots', () => {
    const first = reserveToken(empty, 0, 1_000);
    const second = reserveToken(first.state, 0, 1_000);

    expect(second.waitMs).toBeCloseTo(200);
  });

  it('should refuse without reserving when the wait is too long', () => {
    const reservation = reserveToken(empty, 0, 50);

    expect(reservation.admitted).toBe(false);
    expect(reservation.waitMs).toBeCloseTo(100);
    expect(reservation.state.tokens).toBe(0);
  });
});

describe('TokenBucket', () => {
  let now: number;
  let sleeper: jest.Mock<Promise<void>, [number, AbortSignal?]>;

  const bucket = (capacity: number, maxWaitMs: number): TokenBucket =>
    new TokenBucket('reasoning', { capacity, refillPerMs: RATE_PER_MS, maxWaitMs }, () => now, sleeper);

  beforeEach(() => {
    now = 0;
    sleeper = jest.fn<Promise<void>, [number, AbortSignal?]>().mockResolvedValue(undefined);
  });

  it('should admit up to capacity without waiting', async () => {
    const limiter = bucket(2, 1_000);

    await limiter.acquire();
    await limiter.acquire();

    expect(sleeper).not.toHaveBeenCalled();
  });

  it('should make later callers wait for their own token', async () => {
    const limiter = bucket(1, 1_000);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(sleeper).toHaveBeenCalledTimes(2);
    expect(sleeper.mock.calls[0][0]).toBeCloseTo(100);
    expect(sleeper.mock.calls[1][0]).toBeCloseTo(200);
  });

  it('should fail with RateLimited when the wait exceeds the maximum', async () => {
    const limiter = bucket(1, 150);

    await limiter.acquire();
    await limiter.acquire();

    await expect(limiter.acquire()).rejects.toMatchObject({ kind: 'RateLimited', statusCode: 429 });
    expect(limiter.getStatus().tokens).toBe(-1);
  });

  it('should refill over time', async () => {
    const limiter = bucket(1, 0);

    await limiter.acquire();
    now = 100;

    await expect(limiter.acquire()).resolves.toBeUndefined();
  });

  it('should not admit an aborted caller', async () => {
    const limiter = bucket(1, 1_000);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toThrow();
    expect(limiter.getStatus().tokens).toBe(1);
  });

  it('should report capacity and current tokens', () => {
    expect(bucket(3, 0).getStatus()).toEqual({ capacity: 3, tokens: 3 });
  });
});

import { CircuitBreaker } from '../../src/resilience/circuitBreaker';
import { AppError } from '../../src/utils/AppError';

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  const fail = (): void => breaker.recordFailure(breaker.request());

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker('storage', { failureThreshold: 2, openDurationMs: 10_000 }, () => now);
  });

  it('should reject with CircuitOpen once open', () => {
    fail();
    fail();

    let caught: unknown;
    try {
      breaker.request();
    } catch (error) {
      caught = error;
    }

    expect(AppError.isKind(caught, 'CircuitOpen')).toBe(true);
    expect(caught).toMatchObject({ statusCode: 503, message: 'storage is unavailable, retry in 10s' });
  });

  it('should report statistics', () => {
    fail();
    fail();
    now = 4_000;

    expect(breaker.getStatistics()).toEqual({
      status: 'open',
      consecutiveFailures: 2,
      failureThreshold: 2,
      openedAt: new Date(0).toISOString(),
      retryInMs: 6_000,
    });
  });

  it('should recover through a successful trial', () => {
    fail();
    fail();
    now = 10_000;

    const permit = breaker.request();
    expect(permit).toEqual({ trial: true });

    breaker.recordSuccess(permit);
    expect(breaker.getState().status).toBe('closed');
  });

  it('should let only one trial through', () => {
    fail();
    fail();
    now = 10_000;

    breaker.request();

    expect(() => breaker.request()).toThrow('storage is unavailable while a recovery check is in progress');
  });

  it('should reset to closed', () => {
    fail();
    fail();
    breaker.reset();

    expect(breaker.request()).toEqual({ trial: false });
  });
});

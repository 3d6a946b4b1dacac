/**
 * Circuit Breaker
 *
 * One per outbound provider, shared by every request in the process.
 * State is only replaced through transitionCircuit, each call running to
 * completion without awaiting, so concurrent callers can never interleave
 * inside a transition.
 */

import { AppError, logger } from '../utils';
import { initialCircuitState, timeUntilTrial, transitionCircuit } from './circuitTransition';
import type { CircuitEvent, CircuitOptions, CircuitPermit, CircuitState, Clock } from './types';

export interface CircuitStatistics {
  status: CircuitState['status'];
  consecutiveFailures: number;
  failureThreshold: number;
  openedAt: string | null;
  retryInMs: number;
}

export class CircuitBreaker {
  private state: CircuitState = initialCircuitState();

  constructor(
    public readonly providerId: string,
    private readonly options: CircuitOptions,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * Admits a call or rejects it with CircuitOpen
   */
  request(): CircuitPermit {
    const admission = this.apply({ type: 'request' });

    if (admission === 'reject') {
      const retryInMs = timeUntilTrial(this.state, this.clock(), this.options);
      throw AppError.circuitOpen(
        retryInMs > 0
          ? `${this.providerId} is unavailable, retry in ${Math.ceil(retryInMs / 1000)}s`
          : `${this.providerId} is unavailable while a recovery check is in progress`
      );
    }

    if (admission === 'trial') {
      logger.info(`Circuit ${this.providerId}: half-open, admitting trial call`);
    }

    return { trial: admission === 'trial' };
  }

  recordSuccess(permit: CircuitPermit): void {
    this.apply({ type: 'success', trial: permit.trial });
  }

  recordFailure(permit: CircuitPermit): void {
    this.apply({ type: 'failure', trial: permit.trial });
  }

  /**
   * Releases a permit whose call never completed. Counts as neither outcome.
   */
  abandon(permit: CircuitPermit): void {
    this.apply({ type: 'abandon', trial: permit.trial });
  }

  getState(): Readonly<CircuitState> {
    return this.state;
  }

  getStatistics(): CircuitStatistics {
    return {
      status: this.state.status,
      consecutiveFailures: this.state.consecutiveFailures,
      failureThreshold: this.options.failureThreshold,
      openedAt: this.state.openedAt === null ? null : new Date(this.state.openedAt).toISOString(),
      retryInMs: timeUntilTrial(this.state, this.clock(), this.options),
    };
  }

  reset(): void {
    this.state = initialCircuitState();
  }

  private apply(event: CircuitEvent) {
    const previous = this.state.status;
    const { state, admission } = transitionCircuit(this.state, event, this.clock(), this.options);
    this.state = state;

    if (previous !== state.status) {
      if (state.status === 'open') {
        logger.warn(
          `Circuit ${this.providerId}: ${previous} → open after ${state.consecutiveFailures} consecutive failures`
        );
      } else if (state.status === 'closed') {
        logger.info(`Circuit ${this.providerId}: recovered, closed`);
      }
    }

    return admission;
  }
}

export default CircuitBreaker;

// Pure circuit breaker transitions
// Every state change goes through transitionCircuit: state in, state out, no side effects

import type {
  CircuitEvent,
  CircuitOptions,
  CircuitState,
  CircuitTransition,
} from './types';

export const initialCircuitState = (): CircuitState => ({
  status: 'closed',
  consecutiveFailures: 0,
  openedAt: null,
  trialInFlight: false,
});

const unchanged = (state: CircuitState): CircuitTransition => ({ state, admission: null });

/**
 * Admission decision for a new call
 */
const onRequest = (state: CircuitState, now: number, options: CircuitOptions): CircuitTransition => {
  switch (state.status) {
    case 'closed':
      return { state, admission: 'pass' };

    case 'open': {
      const elapsed = state.openedAt === null ? Infinity : now - state.openedAt;
      if (elapsed < options.openDurationMs) {
        return { state, admission: 'reject' };
      }
      return {
        state: { ...state, status: 'half_open', trialInFlight: true },
        admission: 'trial',
      };
    }

    case 'half_open':
      if (state.trialInFlight) {
        return { state, admission: 'reject' };
      }
      return { state: { ...state, trialInFlight: true }, admission: 'trial' };
  }
};

/**
 * Applies one event to a circuit.
 *
 * - closed: failures count up to the threshold, then open; a success resets the count
 * - open: rejects until openDurationMs has elapsed, then admits one trial (half_open)
 * - half_open: the trial's success closes, its failure re-opens with a fresh timer
 *
 * Outcomes reported by non-trial calls after the circuit has left closed are
 * ignored: they were admitted before the outage was detected.
 */
export const transitionCircuit = (
  state: CircuitState,
  event: CircuitEvent,
  now: number,
  options: CircuitOptions
): CircuitTransition => {
  switch (event.type) {
    case 'request':
      return onRequest(state, now, options);

    case 'success':
      if (event.trial && state.status === 'half_open') {
        return { state: initialCircuitState(), admission: null };
      }
      if (!event.trial && state.status === 'closed') {
        return {
          state: state.consecutiveFailures === 0 ? state : { ...state, consecutiveFailures: 0 },
          admission: null,
        };
      }
      return unchanged(state);

    case 'failure':
      if (event.trial && state.status === 'half_open') {
        return {
          state: {
            status: 'open',
            consecutiveFailures: state.consecutiveFailures + 1,
            openedAt: now,
            trialInFlight: false,
          },
          admission: null,
        };
      }
      if (!event.trial && state.status === 'closed') {
        const consecutiveFailures = state.consecutiveFailures + 1;
        if (consecutiveFailures >= options.failureThreshold) {
          return {
            state: { status: 'open', consecutiveFailures, openedAt: now, trialInFlight: false },
            admission: null,
          };
        }
        return { state: { ...state, consecutiveFailures }, admission: null };
      }
      return unchanged(state);

    case 'abandon':
      if (event.trial && state.status === 'half_open') {
        return { state: { ...state, trialInFlight: false }, admission: null };
      }
      return unchanged(state);
  }
};

/**
 * Milliseconds until an open circuit admits its trial call
 */
export const timeUntilTrial = (state: CircuitState, now: number, options: CircuitOptions): number => {
  if (state.status !== 'open' || state.openedAt === null) {
    return 0;
  }
  return Math.max(0, options.openDurationMs - (now - state.openedAt));
};

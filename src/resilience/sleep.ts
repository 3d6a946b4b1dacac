import { setTimeout as delay } from 'node:timers/promises';
import type { Sleeper } from './types';

/**
 * Abortable sleep. Rejects with the signal's AbortError when aborted.
 */
export const sleep: Sleeper = async (ms, signal) => {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
};

export default sleep;

/**
 * Per-session serialization.
 *
 * Turns for one session run strictly one after another. Different sessions
 * never wait on each other.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs fn after every earlier call for the same session has settled
   */
  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The tail only tracks completion; the caller observes failures through run
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(sessionId, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }
}

export default SessionLock;

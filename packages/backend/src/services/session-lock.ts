/**
 * In-process per-session execution lock
 * Calls for one session run one at a time in arrival order; different
 * sessions never wait on each other.
 */

export class SessionLock {
  private tails = new Map<string, Promise<void>>();

  async run<T>(sessionId: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(sessionId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(sessionId) === tail) {
        this.tails.delete(sessionId);
      }
    }
  }

  isLocked(sessionId: string): boolean {
    return this.tails.has(sessionId);
  }
}

/**
 * Per-key async mutex. Work queued under one session id runs strictly one at
 * a time, in arrival order; distinct ids never wait on each other.
 */
export class SessionLocks {
  private readonly locks = new Map<string, Promise<void>>();

  async withLock<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    // Gates only ever resolve, so the chain cannot reject.
    const chain = previous.then(() => gate);
    this.locks.set(sessionId, chain);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.locks.get(sessionId) === chain) {
        this.locks.delete(sessionId);
      }
    }
  }

  /** Number of session ids with queued or running work. */
  get activeKeys(): number {
    return this.locks.size;
  }
}

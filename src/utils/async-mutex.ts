// ===========================================
// ASYNC MUTEX
// Serializes access to engine state shared by the polling
// loop, the webhook receiver and the valuation ticker
// ===========================================

export class AsyncMutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquire the mutex. The returned release function must be called exactly once.
   */
  async acquire(): Promise<() => void> {
    if (this.locked) {
      await new Promise<void>(resolve => {
        this.waitQueue.push(resolve);
      });
    }

    this.locked = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;

      // Hand the lock straight to the next waiter so nobody can slip in between
      const next = this.waitQueue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getWaitingCount(): number {
    return this.waitQueue.length;
  }
}

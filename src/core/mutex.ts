/**
 * AsyncMutex — exclusive lock for async sections.
 *
 * One holder at a time; waiters are served in FIFO order. The executor holds
 * it for the whole precondition → effects → commit sequence of an operation.
 */
export class AsyncMutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /**
   * Acquire the lock. Resolves with an idempotent release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.releaser();
    }
    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /**
   * Run `fn` while holding the lock; the lock is released even if it throws.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand over in a microtask; the lock stays held across the handoff.
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

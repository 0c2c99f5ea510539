/**
 * Promise-chained mutex. Waiters are served in FIFO order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  /**
   * Waits for the lock and resolves with its release function
   */
  async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      release();
    };
  }

  /**
   * Runs an operation while holding the lock
   */
  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }
}

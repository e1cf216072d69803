/**
 * FIFO mutual exclusion for async code. Holders run strictly one at a time
 * in the order they called runExclusive; a holder that throws still
 * releases the lock.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private active = false;
  private waiting = 0;

  /** True only while a holder is running its critical section. */
  get isLocked(): boolean {
    return this.active;
  }

  /** Callers queued behind the current holder. */
  get pending(): number {
    return this.waiting;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting++;
    await previous;
    this.waiting--;
    this.active = true;
    try {
      return await fn();
    } finally {
      this.active = false;
      release();
    }
  }
}

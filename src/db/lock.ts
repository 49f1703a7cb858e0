/**
 * FIFO async mutex. Each caller waits for the previous holder's promise, so
 * critical sections run one at a time in the order they were requested.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get waiting(): number {
    return this.pending;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.pending += 1;
    try {
      await previous;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}

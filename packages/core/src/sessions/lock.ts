/**
 * FIFO async mutex. `run` callers are admitted one at a time in call order;
 * a callback that throws still releases the lock.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get busy(): boolean {
    return this.holders > 0;
  }

  async run<T>(task: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => undefined;
    const previous = this.tail;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.holders += 1;
    try {
      await previous;
      return await task();
    } finally {
      this.holders -= 1;
      release();
    }
  }
}

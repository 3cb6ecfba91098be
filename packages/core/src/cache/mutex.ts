/**
 * Minimal async mutex. Callers queue behind the previous holder; the lock is released when the
 * callback settles, whether it resolves or rejects.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;

    try {
      await previous;
      return await task();
    } finally {
      this.waiting--;
      release();
    }
  }

  isLocked(): boolean {
    return this.waiting > 0;
  }
}

/**
 * Per-key mutual exclusion for async code.
 *
 * Tasks sharing a key run one after another in submission order; tasks
 * with different keys run independently. Adapters key it by package id
 * to make check-then-write sequences indivisible.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task currently holds or waits for the key.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

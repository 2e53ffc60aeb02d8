/**
 * Per-key async mutex.
 *
 * Callers holding different keys run in parallel; callers sharing a key run
 * one at a time in arrival order.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `fn` while holding `key`.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Run `fn` while holding every key. Keys are taken in sorted order so two
   * callers locking overlapping sets cannot deadlock.
   */
  async runExclusiveAll<T>(keys: readonly string[], fn: () => Promise<T> | T): Promise<T> {
    const sorted = Array.from(new Set(keys)).sort();
    const acquire = (index: number): Promise<T> => {
      if (index >= sorted.length) {
        return Promise.resolve(fn());
      }
      return this.runExclusive(sorted[index], () => acquire(index + 1));
    };
    return acquire(0);
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Keyed Mutex
 *
 * Serializes async work per key (one promise chain per user ID) while
 * different keys run concurrently. A key's chain is dropped once it drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` after every task previously queued for `key` has settled.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
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
   * Whether any task is running or queued for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with running or queued work.
   */
  size(): number {
    return this.tails.size;
  }
}

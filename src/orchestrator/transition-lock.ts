/**
 * Keyed transition lock.
 *
 * Callers for the same key run one at a time in arrival order; different
 * keys never wait on each other. The tail promise of each key is kept in a
 * map and dropped once the last holder releases.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, critical: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await critical();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a holder or waiters */
  get size(): number {
    return this.tails.size;
  }
}

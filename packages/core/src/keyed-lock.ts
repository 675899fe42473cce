/**
 * Exclusive sections keyed by id. Callers on the same key run one at a time
 * in arrival order; different keys do not wait on each other.
 */
export class KeyedLock<K> {
  private tails = new Map<K, Promise<void>>();

  get size(): number {
    return this.tails.size;
  }

  async withLock<T>(key: K, fn: () => Promise<T>): Promise<T> {
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
}

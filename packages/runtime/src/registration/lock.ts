// Per-key mutual exclusion for in-process registration

/**
 * Serialises async work per key. Tasks on the same key run one at a time
 * in call order; tasks on different keys do not wait for each other.
 */
export class KeyedLock<K> {
  private readonly locks = new Map<K, Promise<void>>();

  /**
   * Wait for the key and return its release function.
   * Releasing twice is a no-op.
   */
  async acquire(key: K): Promise<() => void> {
    const existing = this.locks.get(key) ?? Promise.resolve();

    let open: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const current = existing.then(() => gate);
    this.locks.set(key, current);

    await existing;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      open();
      if (this.locks.get(key) === current) {
        this.locks.delete(key);
      }
    };
  }

  /**
   * Run a task while holding the key.
   */
  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  /**
   * Number of keys currently held or waited on
   */
  get size(): number {
    return this.locks.size;
  }
}

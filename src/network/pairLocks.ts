/**
 * Serialises asynchronous critical sections per key. Sections sharing a key
 * run one after the other in arrival order; sections on distinct keys never
 * wait on each other. The store keys writes by unordered node pair.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with a running or queued section. */
  get activeKeys(): number {
    return this.tails.size;
  }

  async runExclusive<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      // Only the last queued section clears the entry.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

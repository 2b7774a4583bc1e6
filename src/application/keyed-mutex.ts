/**
 * Per-key promise-chain lock.
 *
 * Work submitted under the same key runs strictly one at a time, in
 * submission order. Different keys proceed concurrently. Only serialises
 * callers sharing this instance (i.e. one process).
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails.set(key, current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last in the chain cleans up
      if (this.tails.get(key) === current) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with work queued or running. */
  get size(): number {
    return this.tails.size;
  }
}

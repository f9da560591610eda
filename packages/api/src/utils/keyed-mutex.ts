/**
 * Serializes async work per key. Work on different keys runs concurrently;
 * work on the same key runs in arrival order, one at a time.
 */
export class KeyedMutex<K = string> {
  // Tail of each key's chain. Tails never reject.
  private tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

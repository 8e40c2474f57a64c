/**
 * Serializes async work per key by chaining each task onto the previous one.
 * Tasks for different keys run independently.
 */
export class KeyedLock<K> {
  private readonly tails = new Map<K, Promise<void>>();

  async run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // the chain only orders tasks; the caller sees the task's own rejection
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isBusy(key: K): boolean {
    return this.tails.has(key);
  }
}

/**
 * Serializes async work per key. Work for different keys runs concurrently;
 * work for the same key runs in call order, each task starting after the
 * previous one settles (fulfilled or rejected).
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<void>>();

  runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    // Drop the entry once nothing is queued behind this task.
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}

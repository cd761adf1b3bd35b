/**
 * Keyed promise queue - runs tasks one at a time per key
 *
 * Tasks for different keys run concurrently. A failed task does not stop the
 * tasks queued after it; its rejection is returned to its own caller only.
 */
export class KeyedQueue {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs fn after every task previously queued under the same key has settled
   */
  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);

    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /**
   * Number of keys with pending work
   */
  size(): number {
    return this.tails.size;
  }
}

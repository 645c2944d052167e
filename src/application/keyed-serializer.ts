/**
 * Runs tasks one at a time per key.
 *
 * Each key owns a promise chain; a task starts only after every earlier
 * task for the same key has settled. Tasks for different keys interleave
 * freely. A rejected task does not break the chain for the next one.
 */
export class KeyedSerializer {
  private readonly tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      // Only the last task of a chain clears the key
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Keys with a task queued or running. */
  get activeKeys(): number {
    return this.tails.size;
  }

  /** Resolves when every chain queued so far has settled. */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }
}

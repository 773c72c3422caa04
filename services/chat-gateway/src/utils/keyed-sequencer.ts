/**
 * Runs async tasks one at a time per key, in the order `run` was called.
 * Tasks under different keys never wait on each other.
 */
export class KeyedSequencer {
  private readonly tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(() => task());

    // The tail never rejects, so the next task starts whatever this one did
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
   * Whether a task for this key is queued or running
   */
  isBusy(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Number of keys with queued or running tasks
   */
  get activeKeys(): number {
    return this.tails.size;
  }
}

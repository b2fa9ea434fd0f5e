/**
 * Serializes async work per key: a task for key K starts only after every earlier
 * task for K has settled. Different keys run independently.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail never rejects, so the next task in line always starts.
    const tail = run.then(
      () => undefined,
      () => undefined
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

  /** Keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}

/**
 * One logical lock per key. A task registers every key it needs at call time,
 * so tasks touching a common key run in submission order while tasks with
 * disjoint keys run concurrently. Registration of all keys happens before the
 * first await, which also rules out lock-order deadlocks.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
    const unique = [...new Set(keys)];
    const previous = unique.map((key) => this.tails.get(key) ?? Promise.resolve());

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    for (const key of unique) {
      this.tails.set(key, done);
    }

    const execute = async (): Promise<T> => {
      await Promise.all(previous);
      try {
        return await task();
      } finally {
        release();
        for (const key of unique) {
          if (this.tails.get(key) === done) {
            this.tails.delete(key);
          }
        }
      }
    };

    return execute();
  }

  // Number of keys with a queued or running task
  get size(): number {
    return this.tails.size;
  }
}

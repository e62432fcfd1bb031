/**
 * KeyedLock
 *
 * Serialises async critical sections per key inside one process. Calls for the
 * same key run one after another in arrival order; different keys never wait
 * on each other. Tail promises are dropped once a key goes idle.
 *
 * @example
 * const lock = new KeyedLock();
 * await lock.run(entityId, async () => {
 *   const latest = await readLatest(entityId);
 *   await insertAfter(latest);
 * });
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Number of keys with a running or queued task.
   */
  get size(): number {
    return this.tails.size;
  }
}

/**
 * Serializes async tasks that share a key. Tasks on different keys run
 * independently; tasks on the same key run one at a time in call order.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    // tails always settle to undefined, so a failed task never blocks the next one
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
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

  // number of keys with a task queued or running
  pendingKeys(): number {
    return this.tails.size;
  }
}

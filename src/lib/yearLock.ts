// src/lib/yearLock.ts

/**
 * Runs tasks one at a time per key. Used so load-mutate-save sequences on the
 * same year never interleave when requests overlap.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // the caller sees the rejection through `result`; the queue only needs settling
    const tail = result.catch(() => undefined);

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  pending(key: string): boolean {
    return this.tails.has(key);
  }
}

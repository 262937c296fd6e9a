/**
 * Per-key mutual exclusion.
 *
 * Work submitted under the same key runs one at a time in submission order;
 * different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `work` once every earlier task for `key` has settled.
   */
  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

/**
 * Bounded FIFO queue with timed async consumption.
 *
 * Producers push synchronously; consumers await `shift(timeoutMs)`, which
 * resolves with the next item or `undefined` once the deadline passes.
 * When full, the oldest item is dropped and returned from `push`.
 */
export class AsyncQueue<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  constructor(readonly capacity: number = 1000) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.buffer.length;
  }

  /**
   * Enqueue an item.
   *
   * @returns The item dropped to make room, if the queue was full
   */
  push(item: T): T | undefined {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return undefined;
    }

    let dropped: T | undefined;
    if (this.buffer.length >= this.capacity) {
      dropped = this.buffer.shift();
    }
    this.buffer.push(item);
    return dropped;
  }

  /**
   * Take the next item, waiting at most `timeoutMs`.
   */
  shift(timeoutMs: number): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }

    if (timeoutMs <= 0) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter = (item: T): void => {
        clearTimeout(timer);
        resolve(item);
      };

      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(undefined);
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  /**
   * Remove and return everything currently buffered.
   */
  drain(): T[] {
    return this.buffer.splice(0, this.buffer.length);
  }
}

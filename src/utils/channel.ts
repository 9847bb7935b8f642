/**
 * Append-only, single-consumer async queue.
 *
 * `push` never waits for the consumer: values are buffered until pulled.
 * Once `close` is called the iterator drains the buffer and finishes.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;
  private consumed = false;

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
      return;
    }
    this.buffer.push(value);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consumed) {
      throw new Error('Channel can only be iterated once');
    }
    this.consumed = true;

    return {
      next: () => {
        const value = this.buffer.shift();
        if (value !== undefined) {
          return Promise.resolve({ value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
    };
  }
}

/**
 * Bounded single-consumer queue. Producers never block: `push` returns
 * `false` when the queue is full or closed and the value is dropped.
 */
export class EventChannel<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number = 64) {}

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) return false;
    this.buffer.push(value);
    return true;
  }

  /**
   * Next value, or `done` once the channel is closed and drained.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) return Promise.resolve({ value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    if (this.waiter) throw new Error('EventChannel supports a single consumer');
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting values. Buffered values are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

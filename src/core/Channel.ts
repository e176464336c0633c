/**
 * Unbounded FIFO handoff between any number of senders and one consumer.
 *
 * Values may not be null or undefined. Senders never wait. The consumer
 * iterates with `for await`; iteration ends once the channel is closed and
 * every buffered value has been delivered.
 */

type Resolver<T> = (result: IteratorResult<T>) => void;

export class Channel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: Resolver<T> | undefined;
  private closed = false;
  private iterating = false;

  /** Enqueue a value. Returns false if the channel is closed. */
  send(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Stop accepting values. Buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values buffered and not yet taken by the consumer. */
  get size(): number {
    return this.buffer.length;
  }

  private next(): Promise<IteratorResult<T>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error('Channel: only one consumer may iterate');
    }
    this.iterating = true;
    return { next: () => this.next() };
  }
}

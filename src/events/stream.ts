/**
 * FIFO queue consumed with `for await`. Producers push synchronously while a
 * single consumer drains the queue in emission order; closing the queue ends
 * the iteration once the consumer is parked, dropping anything still buffered.
 */
export class MessageQueue<T> implements AsyncIterable<T>, AsyncIterator<T, void, void> {
  private readonly buffer: T[] = [];
  private resolve?: (result: IteratorResult<T, void>) => void;
  private closed = false;

  private static readonly DONE: IteratorReturnResult<void> = Object.freeze({
    value: undefined,
    done: true as const,
  });

  constructor(private readonly label = "queue") {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of items waiting for the consumer. */
  get size(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, void, void> {
    return this;
  }

  /**
   * Enqueues an item. Returns `false` when the queue is already closed so
   * producers can tell a dropped item from a delivered one.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.resolve) {
      const resolve = this.resolve;
      this.resolve = undefined;
      resolve({ value: item, done: false });
      return true;
    }
    this.buffer.push(item);
    return true;
  }

  async next(): Promise<IteratorResult<T, void>> {
    const head = this.buffer.shift();
    if (head !== undefined) {
      return { value: head, done: false };
    }
    if (this.closed) {
      return MessageQueue.DONE;
    }
    if (this.resolve) {
      throw new Error(`${this.label} supports a single consumer`);
    }
    return new Promise((resolve) => {
      this.resolve = resolve;
    });
  }

  async return(): Promise<IteratorResult<T, void>> {
    this.close();
    return MessageQueue.DONE;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer.length = 0;
    if (this.resolve) {
      this.resolve(MessageQueue.DONE);
      this.resolve = undefined;
    }
  }
}

/**
 * Event Channel
 *
 * Bounded single-producer / single-consumer queue consumed with `for await`.
 * The producer never blocks: when the buffer is full the oldest droppable
 * event is discarded to make room. Events that are not droppable are always
 * delivered, even past capacity. Delivery order is the push order.
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly capacity: number = 256,
    private readonly isDroppable: (item: T) => boolean = () => false
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Queue an item. Returns false when it was not queued (channel closed,
   * or the item itself was dropped on a full channel).
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      const index = this.buffer.findIndex(this.isDroppable);
      if (index >= 0) {
        this.buffer.splice(index, 1);
        this.droppedCount++;
      } else if (this.isDroppable(item)) {
        this.droppedCount++;
        return false;
      }
    }

    this.buffer.push(item);
    return true;
  }

  /**
   * No more items will be pushed. Buffered items are still delivered.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve({ value, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.next();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }
}

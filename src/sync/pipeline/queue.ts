/**
 * Fixed-capacity async hand-off between one producer and one consumer.
 * `push` waits while the queue is full; iteration waits while it is empty.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private spaceWaiters: Array<() => void> = [];
  private itemWaiters: Array<() => void> = [];
  private closed = false;
  private cancelled = false;
  private failure: { error: unknown } | null = null;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Resolves false once the queue no longer accepts items. */
  async push(item: T): Promise<boolean> {
    while (this.items.length >= this.capacity && !this.cancelled && !this.closed) {
      await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
    }
    if (this.cancelled || this.closed) return false;
    this.items.push(item);
    wake(this.itemWaiters);
    return true;
  }

  /** No more items; the consumer drains what is queued, then stops. */
  close(): void {
    this.closed = true;
    wake(this.itemWaiters);
    wake(this.spaceWaiters);
  }

  /** Like `close`, but the consumer throws `error` after draining. */
  fail(error: unknown): void {
    this.failure = { error };
    this.close();
  }

  /** Drop queued items and release both sides. */
  cancel(): void {
    this.cancelled = true;
    this.items.length = 0;
    wake(this.itemWaiters);
    wake(this.spaceWaiters);
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (this.items.length === 0) {
      if (this.cancelled) return { done: true, value: undefined };
      if (this.closed) {
        if (this.failure) throw this.failure.error;
        return { done: true, value: undefined };
      }
      await new Promise<void>((resolve) => this.itemWaiters.push(resolve));
    }
    const item = this.items[0];
    this.items.splice(0, 1);
    wake(this.spaceWaiters);
    return { done: false, value: item };
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

function wake(waiters: Array<() => void>): void {
  for (const resolve of waiters.splice(0)) resolve();
}

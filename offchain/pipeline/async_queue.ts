/** Unbounded FIFO consumed with `for await`; iteration ends once closed and drained. */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /** Drops queued items and ends iteration for every consumer. */
  drain(): number {
    const dropped = this.items.length;
    this.items = [];
    this.close();
    return dropped;
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}

/**
 * Runs `worker` over every item with at most `concurrency` in flight and
 * resolves once all of them settled. Rejections are handed to `onError`.
 */
export async function runPool<T>(
  items: Iterable<T>,
  concurrency: number,
  worker: (item: T) => Promise<void>,
  onError: (item: T, err: unknown) => void,
): Promise<void> {
  const queue = new AsyncQueue<T>();
  for (const item of items) queue.push(item);
  queue.close();
  const consumers: Promise<void>[] = [];
  for (let i = 0; i < Math.max(1, concurrency); i += 1) {
    consumers.push(
      (async () => {
        for await (const item of queue) {
          try {
            await worker(item);
          } catch (err) {
            onError(item, err);
          }
        }
      })(),
    );
  }
  await Promise.all(consumers);
}

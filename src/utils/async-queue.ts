type Waiter<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

/**
 * Unbounded FIFO queue with promise-based consumers.
 *
 * Closing the queue lets consumers drain what is left and then report `done`.
 * A consumer may pass an AbortSignal; an aborted wait resolves `done` and
 * never consumes an item.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  enqueue(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      this.release(waiter);
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  dequeue(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const item = this.items[0];
      this.items.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          resolve(DONE);
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      this.release(waiter);
      waiter.resolve(DONE);
    }
  }

  /** Iterates until the queue is closed and drained, or until `signal` aborts. */
  iterate(signal?: AbortSignal): AsyncIterable<T> {
    return {
      [Symbol.asyncIterator]: () => ({
        next: () => this.dequeue(signal),
        return: async () => DONE,
      }),
    };
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private release(waiter: Waiter<T>): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }
}

type Waiter<T> = {
  resolve: (value: T | null) => void;
  reject: (err: Error) => void;
};

/**
 * Unbounded FIFO handing values from event callbacks to a single async reader.
 * `shift()` resolves `null` once the queue is closed and drained, or rejects with
 * the close error.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  get length(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return true;
    }
    this.items.push(item);
    return true;
  }

  shift(): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    if (this.closed) {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve(null);
    }
    return new Promise<T | null>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Queued items stay readable; waiters settle immediately. */
  close(err?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.failure = err ?? null;
    for (const waiter of this.waiters.splice(0)) {
      if (err) {
        waiter.reject(err);
      } else {
        waiter.resolve(null);
      }
    }
  }
}

/**
 * Async Queue - Unbounded FIFO Channel Between Callbacks and Async Loops
 *
 * Producers push from event callbacks (ws events, HTTP upgrades); a single
 * consumer awaits items inside its async loop. Closing the queue resolves all
 * pending and future reads with `undefined` once buffered items are drained.
 */

type Waiter<T> = {
  resolve: (item: T | undefined) => void;
  timer?: NodeJS.Timeout;
};

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private isClosed = false;

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Returns false when the queue is already closed. */
  push(item: T): boolean {
    if (this.isClosed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Next item in FIFO order. Resolves `undefined` when the queue is closed and
   * empty, or when `timeoutMs` (> 0) elapses first.
   */
  next(timeoutMs?: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve };
      if (timeoutMs !== undefined && timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Takes the first buffered item matching `predicate` out of the queue. */
  remove(predicate: (item: T) => boolean): T | undefined {
    const index = this.items.findIndex(predicate);
    if (index === -1) return undefined;
    return this.items.splice(index, 1)[0];
  }

  /** Removes and returns everything currently buffered. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }
}

/**
 * Outcome of a bounded wait on the queue
 */
export type QueuePopResult<T> =
  | { status: 'item'; item: T }
  | { status: 'timeout' }
  | { status: 'closed' };

interface PopWaiter<T> {
  resolve: (result: QueuePopResult<T>) => void;
  timer?: ReturnType<typeof setTimeout>;
}

interface PushWaiter {
  resolve: (accepted: boolean) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * AsyncQueue - Bounded FIFO queue for producer/worker coordination.
 *
 * Both push() and pop() accept a timeout so callers can wake up
 * periodically and recheck a stop flag instead of blocking forever.
 * After close(), pending and future pops drain the remaining items and then
 * report `closed`; pushes are refused.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly popWaiters: PopWaiter<T>[] = [];
  private readonly pushWaiters: PushWaiter[] = [];
  private closed = false;

  constructor(private readonly capacity: number = Infinity) {
    if (!(capacity >= 1)) {
      throw new RangeError(`AsyncQueue capacity must be >= 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Add an item, waiting for free space if the queue is full.
   *
   * @param item - Item to enqueue
   * @param timeoutMs - Maximum wait for space (default: unbounded)
   * @returns true when enqueued, false on timeout or when the queue is closed
   */
  async push(item: T, timeoutMs?: number): Promise<boolean> {
    while (!this.closed) {
      if (this.deliver(item)) {
        return true;
      }

      const hasSpace = await this.waitForSpace(timeoutMs);
      if (!hasSpace) {
        return false;
      }
    }
    return false;
  }

  /**
   * Take the oldest item.
   *
   * @param timeoutMs - Maximum wait for an item (default: unbounded)
   */
  pop(timeoutMs?: number): Promise<QueuePopResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.wakePusher();
      return Promise.resolve({ status: 'item', item });
    }

    if (this.closed) {
      return Promise.resolve({ status: 'closed' });
    }

    return new Promise<QueuePopResult<T>>((resolve) => {
      const waiter: PopWaiter<T> = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.remove(this.popWaiters, waiter);
          resolve({ status: 'timeout' });
        }, timeoutMs);
      }
      this.popWaiters.push(waiter);
    });
  }

  /**
   * Refuse further pushes. Items already queued can still be popped.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.popWaiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve({ status: 'closed' });
    }
    for (const waiter of this.pushWaiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(false);
    }
  }

  /**
   * Hand the item to a waiting consumer or store it if there is room.
   */
  private deliver(item: T): boolean {
    const waiter = this.popWaiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve({ status: 'item', item });
      return true;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }

    return false;
  }

  private waitForSpace(timeoutMs?: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter: PushWaiter = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.remove(this.pushWaiters, waiter);
          resolve(false);
        }, timeoutMs);
      }
      this.pushWaiters.push(waiter);
    });
  }

  private wakePusher(): void {
    const waiter = this.pushWaiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }

  private remove<W>(waiters: W[], waiter: W): void {
    const index = waiters.indexOf(waiter);
    if (index !== -1) {
      waiters.splice(index, 1);
    }
  }
}

interface Waiter {
  resolve: () => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

/**
 * PermitGate - Counting gate whose capacity can change at runtime.
 *
 * Unlike a semaphore that is rebuilt on every resize, the gate keeps one
 * in-flight counter. Shrinking the capacity never revokes permits that are
 * already held; it only delays new grants until enough holders release.
 * Waiters are served in FIFO order.
 *
 * @example
 * ```typescript
 * const gate = new PermitGate(2);
 * await gate.acquire();
 * try {
 *   await callRemote();
 * } finally {
 *   gate.release();
 * }
 * ```
 */
export class PermitGate {
  private capacity: number;
  private inFlight = 0;
  private readonly waiters: Waiter[] = [];

  constructor(capacity: number) {
    this.capacity = PermitGate.assertCapacity(capacity);
  }

  /**
   * Current capacity
   */
  get limit(): number {
    return this.capacity;
  }

  /**
   * Permits currently held
   */
  get active(): number {
    return this.inFlight;
  }

  /**
   * Callers waiting for a permit
   */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit.
   *
   * Rejects with the signal's reason if `signal` aborts before a permit is
   * granted; the caller then holds nothing and must not call release().
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.waiters.length === 0 && this.inFlight < this.capacity) {
      this.inFlight++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a permit and hand it to the next waiter if capacity allows.
   */
  release(): void {
    if (this.inFlight === 0) {
      throw new Error('PermitGate.release() called without a held permit');
    }
    this.inFlight--;
    this.drain();
  }

  /**
   * Change the capacity. Holders keep their permits; grants follow the new
   * limit from now on.
   */
  resize(capacity: number): void {
    this.capacity = PermitGate.assertCapacity(capacity);
    this.drain();
  }

  private drain(): void {
    while (this.inFlight < this.capacity && this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      if (!waiter) {
        return;
      }
      waiter.detach();
      this.inFlight++;
      waiter.resolve();
    }
  }

  private static assertCapacity(capacity: number): number {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `PermitGate capacity must be a positive integer, got ${capacity}`,
      );
    }
    return capacity;
  }
}

/**
 * Fixed-capacity buffer that keeps the most recent values.
 *
 * Used for latency windows: pushing into a full buffer evicts the oldest
 * sample.
 */
export class RingBuffer<T> {
  private readonly values: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `RingBuffer capacity must be a positive integer, got ${capacity}`,
      );
    }
  }

  get size(): number {
    return this.values.length;
  }

  push(value: T): void {
    if (this.values.length === this.capacity) {
      this.values.shift();
    }
    this.values.push(value);
  }

  toArray(): T[] {
    return [...this.values];
  }

  clear(): void {
    this.values.length = 0;
  }
}

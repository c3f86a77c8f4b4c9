/**
 * Fixed-capacity FIFO over a preallocated backing array. Pushing onto a full
 * buffer overwrites the oldest element; nothing is reallocated after
 * construction.
 */
export class RingBuffer<T extends NonNullable<unknown>> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest element
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer: capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append a value. Returns the evicted element when the buffer was full.
   */
  push(value: T): T | undefined {
    const writeAt = (this.head + this.count) % this.capacity;

    if (this.count < this.capacity) {
      this.slots[writeAt] = value;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Most recent element, if any.
   */
  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  /**
   * Copy of the contents, oldest to newest.
   */
  toArray(): T[] {
    return this.latest(this.count);
  }

  /**
   * Copy of up to `n` most recent elements, oldest to newest.
   */
  latest(n: number): T[] {
    const take = Math.max(0, Math.min(Math.floor(n), this.count));
    const out: T[] = [];
    const start = this.head + this.count - take;

    for (let i = 0; i < take; i++) {
      const value = this.slots[(start + i) % this.capacity];
      if (value !== undefined) out.push(value);
    }
    return out;
  }

  /**
   * Drop elements from the oldest end while `predicate` holds. Returns how many
   * were removed.
   */
  dropWhile(predicate: (value: T) => boolean): number {
    let removed = 0;
    while (this.count > 0) {
      const oldest = this.slots[this.head];
      if (oldest === undefined || !predicate(oldest)) break;
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      removed++;
    }
    return removed;
  }
}

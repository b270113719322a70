// src/utils/ring-buffer.ts
// Bounded history buffer (connection state transitions)

/**
 * Keeps the most recent `capacity` entries. Pushing onto a full buffer
 * evicts the oldest entry and returns it.
 */
export class RingBuffer<T> {
  private slots: (T | undefined)[];
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  push(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.start];
    this.slots[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /**
   * Entries oldest first
   */
  getAll(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  last(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.start + this.count - 1) % this.capacity];
  }

  get length(): number {
    return this.count;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}

/**
 * Fixed-capacity append-only buffer. Once full, each push evicts the
 * oldest item. Push is O(1); reading the newest N items is O(N).
 */
export class RingBuffer<T> {
  private items: Array<T | undefined>;
  private start = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Append an item; returns true when an older item was evicted
   */
  push(item: T): boolean {
    if (this.count < this.capacity) {
      this.items[(this.start + this.count) % this.capacity] = item;
      this.count++;
      return false;
    }
    this.items[this.start] = item;
    this.start = (this.start + 1) % this.capacity;
    return true;
  }

  /**
   * Items in insertion order, oldest first
   */
  toArray(): T[] {
    return this.slice(0, this.count);
  }

  /**
   * The newest `n` items, oldest first
   */
  last(n: number): T[] {
    const take = Math.max(0, Math.min(n, this.count));
    return this.slice(this.count - take, this.count);
  }

  clear(): void {
    this.items = new Array<T | undefined>(this.capacity);
    this.start = 0;
    this.count = 0;
  }

  private slice(from: number, to: number): T[] {
    const out: T[] = [];
    for (let i = from; i < to; i++) {
      const item = this.items[(this.start + i) % this.capacity];
      if (item !== undefined) {
        out.push(item);
      }
    }
    return out;
  }
}

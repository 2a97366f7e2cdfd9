// ring-buffer.ts — Fixed-capacity FIFO; oldest item is overwritten once full

export class RingBuffer<T> {
  private buf: T[] = [];
  private head = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    if (this.buf.length < this.capacity) {
      this.buf.push(item);
      return;
    }
    this.buf[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Returns all items in insertion order (oldest first). */
  getAll(): T[] {
    if (this.head === 0) return this.buf.slice();
    return [...this.buf.slice(this.head), ...this.buf.slice(0, this.head)];
  }

  /** Returns the last N items (most recent last). */
  getLast(n: number): T[] {
    if (n <= 0) return [];
    const all = this.getAll();
    return n >= all.length ? all : all.slice(all.length - n);
  }

  /** Most recent item, if any. */
  peek(): T | undefined {
    if (this.buf.length === 0) return undefined;
    const idx = this.buf.length < this.capacity ? this.buf.length - 1 : (this.head + this.capacity - 1) % this.capacity;
    return this.buf[idx];
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.getAll().filter(predicate);
  }

  clear(): void {
    this.buf = [];
    this.head = 0;
  }

  get size(): number {
    return this.buf.length;
  }
}

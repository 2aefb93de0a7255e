/**
 * Unbounded FIFO queue backed by a growable ring buffer.
 *
 * O(1) amortized enqueue, O(1) dequeue and peek. Nothing is ever dropped:
 * the buffer doubles when full.
 */
export class FifoQueue<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(initialCapacity = 16) {
    if (initialCapacity < 1) {
      throw new RangeError(`Queue capacity must be positive, got ${initialCapacity}`);
    }
    this.buffer = new Array<T | undefined>(initialCapacity);
  }

  enqueue(item: T): void {
    if (this.count === this.buffer.length) {
      this.grow();
    }
    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.buffer.length;
    this.count++;
  }

  /**
   * Remove and return the oldest item, or undefined if empty.
   */
  dequeue(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined;
    this.head = (this.head + 1) % this.buffer.length;
    this.count--;
    return item;
  }

  peek(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.buffer[this.head];
  }

  /**
   * Remove all items, returning them in FIFO order.
   */
  drain(): readonly T[] {
    const result: T[] = [];
    let item = this.dequeue();
    while (item !== undefined) {
      result.push(item);
      item = this.dequeue();
    }
    this.head = 0;
    this.tail = 0;
    return result;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.buffer.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.buffer[(this.head + i) % this.buffer.length];
    }
    this.buffer = next;
    this.head = 0;
    this.tail = this.count;
  }
}

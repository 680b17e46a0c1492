/**
 * Fixed-capacity ring buffer.
 *
 * Keeps the most recent `capacity` items in insertion order. Once full,
 * each push overwrites the oldest slot.
 */
export class RollingWindow<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /**
   * Number of items currently held.
   */
  get size(): number {
    return this.count;
  }

  /**
   * Appends an item.
   *
   * @returns The evicted item, if the window was full
   */
  push(item: T): T | undefined {
    const index = (this.head + this.count) % this.capacity;

    if (this.count < this.capacity) {
      this.slots[index] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Most recently pushed item.
   */
  latest(): T | undefined {
    if (this.count === 0) return undefined;
    return this.slots[(this.head + this.count - 1) % this.capacity];
  }

  /**
   * Items oldest first.
   */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}

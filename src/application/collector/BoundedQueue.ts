/**
 * spanline - Bounded Queue
 *
 * Fixed-capacity FIFO ring buffer. Pushing into a full queue evicts the
 * oldest item.
 */

import { ConfigurationException } from '../../domain/exceptions';

/**
 * Drop-oldest ring buffer. `undefined` marks an empty slot, so it is not a
 * valid item.
 *
 * @example
 * ```typescript
 * const queue = new BoundedQueue<number>(2);
 * queue.push(1);
 * queue.push(2);
 * queue.push(3);    // returns true: 1 was evicted
 * queue.take(10);   // [2, 3]
 * ```
 */
export class BoundedQueue<T extends NonNullable<unknown>> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private _size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationException('Invalid queue capacity', {
        capacity: [`must be a positive integer, got ${capacity}`],
      });
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this._size;
  }

  isEmpty(): boolean {
    return this._size === 0;
  }

  isFull(): boolean {
    return this._size === this.capacity;
  }

  /**
   * Append an item.
   *
   * @returns `true` when the oldest item was evicted to make room
   */
  push(item: T): boolean {
    if (this._size === this.capacity) {
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
      return true;
    }

    this.slots[(this.head + this._size) % this.capacity] = item;
    this._size++;
    return false;
  }

  /**
   * Remove and return up to `max` items from the front, oldest first.
   */
  take(max: number): T[] {
    const count = Math.min(max, this._size);
    const items: T[] = [];

    for (let i = 0; i < count; i++) {
      const item = this.slots[this.head];
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      if (item !== undefined) {
        items.push(item);
      }
    }

    this._size -= count;
    if (this._size === 0) {
      this.head = 0;
    }
    return items;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this._size = 0;
  }
}

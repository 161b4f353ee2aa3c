/**
 * Fixed-capacity history of the most recent items, indexed backwards from
 * the newest. Older items are overwritten once the buffer is full.
 */
export class HistoryBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`HistoryBuffer capacity ${capacity} must be a positive integer`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Number of retained items */
  get size(): number {
    return this.count;
  }

  push(item: T): void {
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /**
   * Item `distance` steps before the newest; `back(0)` is the newest.
   * `undefined` when not that much history is retained.
   */
  back(distance: number): T | undefined {
    if (!Number.isInteger(distance) || distance < 0 || distance >= this.count) {
      return undefined;
    }
    const index = (this.head - 1 - distance + this.capacity * 2) % this.capacity;
    return this.slots[index];
  }

  /** Retained items, oldest first */
  toArray(): T[] {
    const items: T[] = [];
    for (let distance = this.count - 1; distance >= 0; distance--) {
      const item = this.back(distance);
      if (item !== undefined) items.push(item);
    }
    return items;
  }
}

import { InvalidArgumentError } from '../../types';

export const DEFAULT_RING_BUFFER_CAPACITY = 100;

/**
 * Fixed-capacity buffer that overwrites its oldest element once full.
 */
export class RingBuffer<T> {
  private slots: T[];
  private head: number = 0;
  private size: number = 0;

  constructor(readonly capacity: number = DEFAULT_RING_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidArgumentError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T>(capacity);
  }

  get length(): number {
    return this.size;
  }

  push(item: T): void {
    const tail = (this.head + this.size) % this.capacity;
    this.slots[tail] = item;
    if (this.size === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.size++;
    }
  }

  /**
   * Oldest first. The returned array is a copy.
   */
  snapshot(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.size; i++) {
      items.push(this.slots[(this.head + i) % this.capacity]);
    }
    return items;
  }

  clear(): void {
    this.slots = new Array<T>(this.capacity);
    this.head = 0;
    this.size = 0;
  }
}

export interface QueueStats {
  depth: number;
  capacity: number;
  dropped: number;
  enqueued: number;
}

/**
 * Fixed-capacity FIFO. When full, the oldest entry is discarded to make room:
 * newer reports for a service supersede older ones anyway.
 */
export class BoundedQueue<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private length = 0;
  private droppedCount = 0;
  private enqueuedCount = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /** Returns the entry that was dropped to make room, if any. */
  push(item: T): T | undefined {
    this.enqueuedCount += 1;
    let dropped: T | undefined;
    if (this.length === this.capacity) {
      dropped = this.shift();
      this.droppedCount += 1;
    }
    this.slots[(this.head + this.length) % this.capacity] = item;
    this.length += 1;
    return dropped;
  }

  shift(): T | undefined {
    if (this.length === 0) return undefined;
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length -= 1;
    return item;
  }

  drain(max: number): T[] {
    const batch: T[] = [];
    while (batch.length < max && this.length > 0) {
      const item = this.shift();
      if (item !== undefined) batch.push(item);
    }
    return batch;
  }

  clear() {
    this.slots.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  get size() {
    return this.length;
  }

  stats(): QueueStats {
    return {
      depth: this.length,
      capacity: this.capacity,
      dropped: this.droppedCount,
      enqueued: this.enqueuedCount,
    };
  }
}

/** Fixed-capacity FIFO that evicts its oldest entry once full. */
export class RingBuffer<T> {
  private items: T[] = [];
  private limit: number;

  constructor(capacity: number) {
    this.limit = normalizeCapacity(capacity);
  }

  get capacity() {
    return this.limit;
  }

  get size() {
    return this.items.length;
  }

  push(value: T) {
    this.items.push(value);
    if (this.items.length > this.limit) {
      this.items.splice(0, this.items.length - this.limit);
    }
  }

  /** Changes the capacity, keeping the newest entries when shrinking. */
  resize(capacity: number) {
    this.limit = normalizeCapacity(capacity);
    if (this.items.length > this.limit) {
      this.items = this.items.slice(this.items.length - this.limit);
    }
  }

  count(predicate: (value: T) => boolean) {
    let total = 0;
    for (const item of this.items) {
      if (predicate(item)) {
        total += 1;
      }
    }
    return total;
  }

  isFull() {
    return this.items.length >= this.limit;
  }

  values(): readonly T[] {
    return this.items.slice();
  }

  clear() {
    this.items = [];
  }
}

function normalizeCapacity(capacity: number) {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Ring buffer capacity must be a positive integer, received ${capacity}`);
  }
  return capacity;
}

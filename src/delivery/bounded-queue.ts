/**
 * Fixed-capacity FIFO ring buffer with a waiting line for blocked producers.
 *
 * Producers that must not drop (the Block policy) park their item with
 * {@link BoundedQueue.waitPush}; each {@link BoundedQueue.shift} admits the
 * oldest parked item into the freed slot, so the queue never has free space
 * while producers are waiting and arrival order is preserved.
 */

interface Waiter<T> {
  readonly item: T;
  readonly admitted: () => void;
}

export class BoundedQueue<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;
  private readonly waiting: Waiter<T>[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('Queue capacity must be a positive integer');
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  /** Producers parked by {@link waitPush} */
  get waiters(): number {
    return this.waiting.length;
  }

  /**
   * Appends `item` unless the queue is full or producers are already waiting
   */
  tryPush(item: T): boolean {
    if (this.count === this.capacity || this.waiting.length > 0) {
      return false;
    }
    this.slots[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return true;
  }

  /**
   * Appends `item`, waiting for a free slot if necessary. Resolves once the
   * item is in the queue; never rejects.
   */
  waitPush(item: T): Promise<void> {
    if (this.tryPush(item)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiting.push({ item, admitted: resolve });
    });
  }

  /**
   * Removes and returns the oldest item, admitting one waiting producer
   */
  shift(): T | undefined {
    const item = this.removeHead();
    const waiter = this.waiting.shift();
    if (waiter !== undefined) {
      this.slots[(this.head + this.count) % this.capacity] = waiter.item;
      this.count++;
      waiter.admitted();
    }
    return item;
  }

  /**
   * Removes the oldest item without admitting waiters; used to make room for
   * a newer item
   */
  evictOldest(): T | undefined {
    return this.removeHead();
  }

  private removeHead(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }
}

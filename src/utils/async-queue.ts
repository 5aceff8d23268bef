import { clampTimerDelay } from './timing.js';

export type Comparator<T> = (a: T, b: T) => number;

interface HeapEntry<T> {
  item: T;
  seq: number;
}

interface Waiter {
  resolve: (ready: boolean) => void;
  timer: NodeJS.Timeout;
}

/**
 * Binary-heap queue with an awaitable, bounded wait for new items.
 *
 * Items are ordered by `compare`; ties fall back to insertion order, so the
 * default comparator gives a plain FIFO. Consumers call `waitForItem` and then
 * `tryPop` in the same synchronous turn; the wait only signals readiness, it
 * never hands an item over, so an item is always either in the heap or owned
 * by exactly one consumer.
 */
export class AsyncQueue<T> {
  private heap: HeapEntry<T>[] = [];
  private seq = 0;
  private waiters: Waiter[] = [];

  constructor(private readonly compare: Comparator<T> = () => 0) {}

  get size(): number {
    return this.heap.length;
  }

  push(item: T): void {
    this.heap.push({ item, seq: this.seq++ });
    this.siftUp(this.heap.length - 1);

    const waiter = this.waiters.shift();
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(true);
    }
  }

  tryPop(): T | undefined {
    const top = this.heap[0];
    if (!top) {
      return undefined;
    }

    const last = this.heap.pop();
    if (last && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top.item;
  }

  /**
   * Resolve `true` as soon as an item is available, `false` after `timeoutMs`
   * or when `interrupt` is called.
   */
  waitForItem(timeoutMs: number): Promise<boolean> {
    if (this.heap.length > 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          resolve(false);
        }, clampTimerDelay(timeoutMs)),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Wake every pending `waitForItem` call with `false`.
   */
  interrupt(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(false);
    }
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.heap.find(entry => predicate(entry.item))?.item;
  }

  /**
   * Snapshot of the queued items in pop order.
   */
  toArray(): T[] {
    return [...this.heap]
      .sort((a, b) => this.order(a, b))
      .map(entry => entry.item);
  }

  clear(): T[] {
    const items = this.toArray();
    this.heap = [];
    return items;
  }

  private order(a: HeapEntry<T>, b: HeapEntry<T>): number {
    return this.compare(a.item, b.item) || a.seq - b.seq;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.swapIfOutOfOrder(parent, child)) {
        return;
      }
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;

      if (this.isBefore(left, smallest)) {
        smallest = left;
      }
      if (this.isBefore(right, smallest)) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private isBefore(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && this.order(a, b) < 0;
  }

  private swapIfOutOfOrder(parent: number, child: number): boolean {
    if (!this.isBefore(child, parent)) {
      return false;
    }
    this.swap(parent, child);
    return true;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this.heap[i] = b;
    this.heap[j] = a;
  }
}

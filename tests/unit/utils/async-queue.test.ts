import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AsyncQueue } from '../../../src/utils/async-queue.js';

describe('AsyncQueue', () => {
  it('pops in FIFO order by default', () => {
    const queue = new AsyncQueue<string>();
    queue.push('a');
    queue.push('b');
    queue.push('c');

    expect([queue.tryPop(), queue.tryPop(), queue.tryPop(), queue.tryPop()]).toEqual(['a', 'b', 'c', undefined]);
  });

  it('orders by comparator and breaks ties by insertion', () => {
    const queue = new AsyncQueue<{ name: string; priority: number }>((a, b) => a.priority - b.priority);
    queue.push({ name: 'low', priority: 5 });
    queue.push({ name: 'first-high', priority: 1 });
    queue.push({ name: 'mid', priority: 3 });
    queue.push({ name: 'second-high', priority: 1 });

    expect(queue.toArray().map(item => item.name)).toEqual(['first-high', 'second-high', 'mid', 'low']);

    const popped: string[] = [];
    let item = queue.tryPop();
    while (item) {
      popped.push(item.name);
      item = queue.tryPop();
    }
    expect(popped).toEqual(['first-high', 'second-high', 'mid', 'low']);
  });

  it('finds and clears items', () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.find(n => n === 2)).toBe(2);
    expect(queue.clear()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });

  describe('waitForItem', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('resolves immediately when items are queued', async () => {
      const queue = new AsyncQueue<number>();
      queue.push(1);
      await expect(queue.waitForItem(1000)).resolves.toBe(true);
    });

    it('wakes a waiter on push', async () => {
      const queue = new AsyncQueue<number>();
      const ready = queue.waitForItem(1000);
      queue.push(7);
      await expect(ready).resolves.toBe(true);
      expect(queue.tryPop()).toBe(7);
    });

    it('times out with false', async () => {
      const queue = new AsyncQueue<number>();
      const ready = queue.waitForItem(1000);
      await vi.advanceTimersByTimeAsync(1000);
      await expect(ready).resolves.toBe(false);
    });

    it('releases every waiter on interrupt', async () => {
      const queue = new AsyncQueue<number>();
      const waits = [queue.waitForItem(1000), queue.waitForItem(1000)];
      queue.interrupt();
      await expect(Promise.all(waits)).resolves.toEqual([false, false]);
    });
  });
});

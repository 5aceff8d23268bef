import { clampTimerDelay } from './timing.js';

/**
 * Debounces values per key: each `schedule` call stores the value as the latest
 * pending one for its key and restarts that key's timer. When a timer fires,
 * `onFire` receives the last value stored for the key; earlier values are
 * dropped.
 */
export class KeyedDebouncer<K, V> {
  private readonly timers = new Map<K, NodeJS.Timeout>();
  private readonly latest = new Map<K, V>();
  private readonly wait: number;

  constructor(
    wait: number,
    private readonly onFire: (value: V, key: K) => void,
  ) {
    this.wait = clampTimerDelay(wait);
  }

  schedule(key: K, value: V): void {
    this.latest.set(key, value);

    const existing = this.timers.get(key);
    if (existing !== undefined) {
      clearTimeout(existing);
    }

    this.timers.set(key, setTimeout(() => this.fire(key), this.wait));
  }

  /**
   * Drop the pending value for a key without invoking `onFire`.
   */
  cancel(key: K): boolean {
    const timer = this.timers.get(key);
    if (timer === undefined) {
      return false;
    }
    clearTimeout(timer);
    this.timers.delete(key);
    this.latest.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.latest.clear();
  }

  pending(key: K): boolean {
    return this.timers.has(key);
  }

  get size(): number {
    return this.timers.size;
  }

  private fire(key: K): void {
    const value = this.latest.get(key);
    this.timers.delete(key);
    this.latest.delete(key);

    if (value !== undefined) {
      this.onFire(value, key);
    }
  }
}

import { InvalidConfigError } from '../core/errors';

export interface LRUCacheHooks<K, V> {
  /** Release a value's external resources. Called on overwrite, eviction and clear. */
  dispose?: (key: K, value: V) => void;
  /** Notified after an entry was evicted for capacity. */
  onEvict?: (key: K) => void;
}

function assertCapacity(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidConfigError(`Cache size must be an integer >= 1 (got ${size})`);
  }
}

/**
 * Bounded generic LRU cache using Map (insertion-order iteration).
 *
 * Map order is the access order: head = least recently used, tail = most
 * recently used. `get()` does NOT refresh an entry; call `touch()` for that.
 * `remove()` hands the value back to the caller undisposed, eviction is the
 * only path where the cache disposes on its own.
 */
export class LRUCache<K, V> {
  // Values are boxed so a stored `undefined` is distinguishable from a miss
  private map = new Map<K, { value: V }>();
  private maxSize: number;
  private readonly hooks: LRUCacheHooks<K, V>;

  constructor(maxSize: number, hooks: LRUCacheHooks<K, V> = {}) {
    assertCapacity(maxSize);
    this.maxSize = maxSize;
    this.hooks = hooks;
  }

  get(key: K): V | undefined {
    return this.map.get(key)?.value;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /** Move an existing key to the most-recently-used position. */
  touch(key: K): void {
    const slot = this.map.get(key);
    if (!slot) return;
    this.map.delete(key);
    this.map.set(key, slot);
  }

  insert(key: K, value: V): void {
    const old = this.map.get(key);
    if (old) {
      this.map.delete(key);
      if (old.value !== value) {
        this.hooks.dispose?.(key, old.value);
      }
    }
    this.map.set(key, { value });
    while (this.map.size > this.maxSize) {
      this.evictOldest();
    }
  }

  remove(key: K): V | undefined {
    const slot = this.map.get(key);
    if (!slot) return undefined;
    this.map.delete(key);
    return slot.value;
  }

  /** Evict the least recently used entry. Returns its key, or undefined when empty. */
  evictOldest(): K | undefined {
    const first = this.map.entries().next();
    if (first.done) return undefined;
    const [key, slot] = first.value;
    this.map.delete(key);
    this.hooks.dispose?.(key, slot.value);
    this.hooks.onEvict?.(key);
    return key;
  }

  setMaxSize(newSize: number): void {
    assertCapacity(newSize);
    this.maxSize = newSize;
    while (this.map.size > this.maxSize) {
      this.evictOldest();
    }
  }

  clear(): void {
    const entries = [...this.map];
    this.map.clear();
    if (this.hooks.dispose) {
      for (const [key, slot] of entries) {
        this.hooks.dispose(key, slot.value);
      }
    }
  }

  /** Keys from least to most recently used. */
  keys(): K[] {
    return [...this.map.keys()];
  }

  entries(): [K, V][] {
    return [...this.map].map(([key, slot]): [K, V] => [key, slot.value]);
  }

  get size(): number {
    return this.map.size;
  }

  get capacity(): number {
    return this.maxSize;
  }
}

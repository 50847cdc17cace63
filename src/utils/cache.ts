/**
 * TTLCache: simple in-memory cache with time-to-live expiry.
 *
 * Expired entries are evicted lazily, on the next read or write of their key,
 * or in bulk by prune(). Every operation is synchronous, so a read-modify-write
 * of one key cannot interleave with another request on the event loop.
 */

export interface CacheEntry<V> {
  value: V;
  insertedAt: number;
  expiresAt: number;
}

export class TTLCache<K, V> {
  private readonly store = new Map<K, CacheEntry<V>>();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;

  constructor(defaultTtlMs: number, now: () => number = Date.now) {
    this.defaultTtlMs = defaultTtlMs;
    this.now = now;
  }

  set(key: K, value: V, ttlMs = this.defaultTtlMs): void {
    const insertedAt = this.now();
    this.store.set(key, { value, insertedAt, expiresAt: insertedAt + ttlMs });
  }

  get(key: K): V | undefined {
    return this.getEntry(key)?.value;
  }

  /** Live entry with its timestamps, or undefined once expired */
  getEntry(key: K): CacheEntry<V> | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  /**
   * Replace the value of a live entry, keeping its expiry.
   * Returns false when the key is missing or expired.
   */
  update(key: K, fn: (value: V) => V): boolean {
    const entry = this.getEntry(key);
    if (!entry) return false;
    this.store.set(key, { ...entry, value: fn(entry.value) });
    return true;
  }

  has(key: K): boolean {
    return this.getEntry(key) !== undefined;
  }

  delete(key: K): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /** Remove all expired entries */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }
}

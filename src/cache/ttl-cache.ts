/**
 * Bounded key -> (value, expiry) cache. Least recently used entries are
 * evicted at capacity; expired entries are dropped when read or pruned.
 */

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxEntries?: number;
  now?: () => number;
}

export class TtlCache<K, V> {
  // Map iteration order doubles as recency order, oldest first
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new Error('Cache TTL must be positive');
    }

    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries ?? 100;
    this.now = options.now ?? Date.now;

    if (!Number.isInteger(this.maxEntries) || this.maxEntries <= 0) {
      throw new Error('Cache size must be positive');
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V, ttlMs = this.ttlMs): void {
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Removes every entry whose key matches `predicate`.
   */
  deleteWhere(predicate: (key: K) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drops expired entries and returns how many were removed.
   */
  prune(): number {
    const now = this.now();
    return this.deleteWhere(key => {
      const entry = this.entries.get(key);
      return entry !== undefined && entry.expiresAt <= now;
    });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  capacity(): number {
    return this.maxEntries;
  }
}

/**
 * LRU cache with TTL, used for place-by-key lookups.
 *
 * Map insertion order doubles as recency order: reads move an entry to the end,
 * eviction removes from the front.
 */

interface CacheEntry<T> {
  data: T;
  storedAt: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  ttlMs?: number;
  now?: () => number;
}

export class LRUCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ maxSize = 100, ttlMs = 10 * 60 * 1000, now = Date.now }: LRUCacheOptions = {}) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  /**
   * Get a value and mark it most recently used. Expired entries read as missing.
   */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.data;
  }

  set(key: string, data: T): void {
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      this.evict();
    }
    this.entries.set(key, { data, storedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.storedAt > this.ttlMs;
  }

  private evict(): void {
    // Expired entries go first
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(key);
    }

    // Then least recently used
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

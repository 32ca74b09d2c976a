/**
 * Entry-bounded LRU cache with optional TTL
 *
 * All operations are synchronous Map operations, so under Node's single event
 * loop a get/set pair can never interleave with another caller's and recency
 * order stays exact.
 */

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface BoundedLRUCacheOptions {
  capacity: number;
  /** 0 disables expiry */
  ttlMs?: number;
  now?: () => number;
}

export interface CacheStats {
  entries: number;
  capacity: number;
  ttlMs: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

export class BoundedLRUCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: BoundedLRUCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.ttlMs = Math.max(0, options.ttlMs ?? 0);
    this.now = options.now ?? Date.now;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt > this.ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * Presence check that neither counts as a hit nor refreshes recency
   */
  has(key: string): boolean {
    const entry = this.cache.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  set(key: string, value: T): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    while (this.cache.size >= this.capacity) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
      this.evictions++;
    }

    this.cache.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): string[] {
    return Array.from(this.cache.keys());
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    const hitRate = lookups > 0 ? (this.hits / lookups) * 100 : 0;

    return {
      entries: this.cache.size,
      capacity: this.capacity,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: Math.round(hitRate * 100) / 100,
    };
  }
}

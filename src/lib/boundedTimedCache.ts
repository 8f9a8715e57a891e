import type { CacheEntry, CacheOptions, CacheStats, Clock } from '../types';
import { requirePositive, requirePositiveInteger } from '../errors';

/**
 * Size-bounded in-memory cache with per-entry TTL and LRU eviction.
 *
 * Map iteration order is the recency order: the first key is the least recently
 * used one. Every method is synchronous, so a call is never interleaved with
 * another on the event loop.
 */
export class BoundedTimedCache<V> {
  readonly maxSize: number;
  readonly defaultTtlSeconds: number;
  private readonly now: Clock;
  private readonly entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(options: CacheOptions) {
    this.maxSize = requirePositiveInteger('maxSize', options.maxSize);
    this.defaultTtlSeconds = requirePositiveInteger('defaultTtlSeconds', options.defaultTtlSeconds);
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    // bump to MRU
    this.entries.delete(key);
    this.entries.set(key, entry);
    entry.accessCount++;
    this.hits++;
    return entry.value;
  }

  set(key: string, value: V, ttlSeconds: number = this.defaultTtlSeconds): void {
    requirePositive('ttlSeconds', ttlSeconds);
    const entry: CacheEntry<V> = { value, expiresAt: this.now() + ttlSeconds * 1000, accessCount: 0 };

    if (this.entries.has(key)) {
      this.entries.delete(key);
      this.entries.set(key, entry);
      return;
    }

    this.entries.set(key, entry);
    if (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  /** Drops every expired entry, read or not. Returns how many were removed. */
  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: totalRequests > 0 ? (this.hits / totalRequests) * 100 : 0,
      totalRequests,
    };
  }
}

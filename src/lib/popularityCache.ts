import type { CacheStats, PopularityCacheOptions } from '../types';
import { requireNonNegativeInteger } from '../errors';
import { BoundedTimedCache } from './boundedTimedCache';

export type AdmitResult = 'admitted' | 'skipped';

/**
 * Short code -> destination cache that only holds "hot" links: an entry is
 * admitted once its observed usage reaches the popularity threshold.
 */
export class PopularityGatedCacheManager {
  readonly threshold: number;
  private readonly cache: BoundedTimedCache<string>;

  constructor(options: PopularityCacheOptions) {
    this.threshold = requireNonNegativeInteger('popularityThreshold', options.popularityThreshold);
    this.cache = new BoundedTimedCache<string>(options);
  }

  lookup(shortCode: string): string | undefined {
    return this.cache.get(shortCode);
  }

  // Below-threshold calls are a silent skip, not an error.
  admit(shortCode: string, destination: string, observedUsage: number, ttlSeconds?: number): AdmitResult {
    if (observedUsage < this.threshold) return 'skipped';
    this.cache.set(shortCode, destination, ttlSeconds);
    return 'admitted';
  }

  invalidate(shortCode: string): void {
    this.cache.delete(shortCode);
  }

  clear(): void {
    this.cache.clear();
  }

  cleanupExpired(): number {
    return this.cache.cleanupExpired();
  }

  stats(): CacheStats {
    return this.cache.stats();
  }
}

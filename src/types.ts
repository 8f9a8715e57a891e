export type Clock = () => number; // ms since epoch

export interface CacheEntry<V> {
  value: V;
  expiresAt: number; // timestamp ms
  accessCount: number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: number; // percent, 0 when nothing was requested
  totalRequests: number;
}

export interface CacheOptions {
  maxSize: number;
  defaultTtlSeconds: number;
  now?: Clock;
}

export interface PopularityCacheOptions extends CacheOptions {
  popularityThreshold: number;
}

export interface TokenBucketOptions {
  capacity: number;
  refillRate: number; // tokens per second
  now?: Clock;
}

export interface RateLimiterOptions {
  requestsPerWindow: number;
  windowSeconds: number;
  now?: Clock;
}

// What a host application's repository hands back on a cache miss
export interface ResolvedDestination {
  destination: string;
  usageCount: number;
}

export * from './lib/boundedTimedCache';
export * from './lib/popularityCache';
export * from './lib/tokenBucket';
export * from './lib/keyedRateLimiter';
export * from './lib/rateLimit';
export * from './lib/cache';
export * from './lib/invalidate';
export * from './lib/keys';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './lib/maintenance';
export * from './lib/logger';
export * from './config';
export * from './errors';
export type {
  Clock,
  CacheEntry,
  CacheStats,
  CacheOptions,
  PopularityCacheOptions,
  TokenBucketOptions,
  RateLimiterOptions,
  ResolvedDestination,
} from './types';

import type { Clock, RateLimiterOptions } from '../types';
import { requirePositiveInteger } from '../errors';
import { TokenBucket } from './tokenBucket';

/**
 * One token bucket per client key, created on first sight of the key.
 * Buckets live until a cleanup sweep drops them.
 */
export class KeyedRateLimiter {
  readonly limit: number;
  readonly windowSeconds: number;
  readonly refillRate: number;
  private readonly now: Clock;
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(options: RateLimiterOptions) {
    this.limit = requirePositiveInteger('requestsPerWindow', options.requestsPerWindow);
    this.windowSeconds = requirePositiveInteger('windowSeconds', options.windowSeconds);
    this.refillRate = this.limit / this.windowSeconds;
    this.now = options.now ?? Date.now;
  }

  isAllowed(key: string): boolean {
    return this.bucketFor(key).consume(1);
  }

  /** Advisory only: concurrent callers may spend these tokens first. */
  remaining(key: string): number {
    return Math.floor(this.bucketFor(key).peek());
  }

  /**
   * Drops half of the buckets that are currently full, in enumeration order.
   * Approximate on purpose: it only has to keep the map bounded over time.
   */
  cleanupOldBuckets(): number {
    const full: string[] = [];
    for (const [key, bucket] of this.buckets) {
      if (bucket.isFull()) full.push(key);
    }
    const victims = full.slice(0, Math.floor(full.length / 2));
    for (const key of victims) this.buckets.delete(key);
    return victims.length;
  }

  has(key: string): boolean {
    return this.buckets.has(key);
  }

  size(): number {
    return this.buckets.size;
  }

  private bucketFor(key: string): TokenBucket {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new TokenBucket({ capacity: this.limit, refillRate: this.refillRate, now: this.now });
      this.buckets.set(key, bucket);
    }
    return bucket;
  }
}

import type { Clock, TokenBucketOptions } from '../types';
import { requirePositive } from '../errors';

/**
 * Refillable permit counter. Tokens are real-valued and refilled lazily from
 * wall-clock time on every access; there is no background timer.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillRate: number; // tokens per second
  private readonly now: Clock;
  private tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions) {
    this.capacity = requirePositive('capacity', options.capacity);
    this.refillRate = requirePositive('refillRate', options.refillRate);
    this.now = options.now ?? Date.now;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  consume(n = 1): boolean {
    requirePositive('n', n);
    this.refill();
    if (this.tokens >= n) {
      this.tokens -= n;
      return true;
    }
    return false;
  }

  peek(): number {
    this.refill();
    return this.tokens;
  }

  isFull(): boolean {
    return this.peek() >= this.capacity;
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }
}

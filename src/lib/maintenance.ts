import type { PopularityGatedCacheManager } from './popularityCache';
import type { KeyedRateLimiter } from './keyedRateLimiter';
import type { Logger } from './logger';
import { requirePositive } from '../errors';

export interface MaintenanceOptions {
  manager?: PopularityGatedCacheManager;
  limiter?: KeyedRateLimiter;
  intervalSeconds: number;
  logger?: Logger;
}

export interface SweepResult {
  expiredRemoved: number;
  bucketsRemoved: number;
}

export interface MaintenanceHandle {
  runOnce(): SweepResult;
  stop(): void;
}

/**
 * Periodically drops expired cache entries nobody re-reads and idle rate-limit
 * buckets. The timer is unref'd so it never holds the process open.
 */
export function startMaintenance(options: MaintenanceOptions): MaintenanceHandle {
  const { manager, limiter, logger } = options;
  const intervalMs = requirePositive('intervalSeconds', options.intervalSeconds) * 1000;

  const runOnce = (): SweepResult => {
    const result = {
      expiredRemoved: manager?.cleanupExpired() ?? 0,
      bucketsRemoved: limiter?.cleanupOldBuckets() ?? 0,
    };
    logger?.debug('maintenance sweep', { ...result });
    return result;
  };

  let handle: ReturnType<typeof setInterval> | null = setInterval(() => {
    try {
      runOnce();
    } catch (err) {
      logger?.error('maintenance sweep failed', { error: err instanceof Error ? err.message : String(err) });
    }
  }, intervalMs);
  handle.unref();

  return {
    runOnce,
    stop() {
      if (handle) {
        clearInterval(handle);
        handle = null;
      }
    },
  };
}

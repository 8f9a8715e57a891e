import type { PopularityGatedCacheManager } from './popularityCache';
import type { KeyedRateLimiter } from './keyedRateLimiter';

export interface MetricsData {
  cacheHits: number;
  cacheMisses: number;
  cacheAdmissions: number;
  cacheSkips: number;
  invalidations: number;
  rateLimitAllowed: number;
  rateLimitBlocks: number;
  timestamp: number;
}

export interface MetricsSources {
  manager?: PopularityGatedCacheManager;
  limiter?: KeyedRateLimiter;
}

function emptyMetrics(): MetricsData {
  return {
    cacheHits: 0,
    cacheMisses: 0,
    cacheAdmissions: 0,
    cacheSkips: 0,
    invalidations: 0,
    rateLimitAllowed: 0,
    rateLimitBlocks: 0,
    timestamp: Date.now(),
  };
}

export class MetricsCollector {
  private metrics: MetricsData = emptyMetrics();

  recordCacheHit(): void {
    this.metrics.cacheHits++;
  }

  recordCacheMiss(admitted: boolean): void {
    this.metrics.cacheMisses++;
    if (admitted) this.metrics.cacheAdmissions++;
    else this.metrics.cacheSkips++;
  }

  recordInvalidation(count = 1): void {
    this.metrics.invalidations += count;
  }

  recordRateLimitAllowed(): void {
    this.metrics.rateLimitAllowed++;
  }

  recordRateLimitBlock(): void {
    this.metrics.rateLimitBlocks++;
  }

  getCurrentMetrics(): MetricsData {
    return { ...this.metrics };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }

  getPrometheusMetrics(sources: MetricsSources = {}): string {
    const current = this.getCurrentMetrics();
    const lines: string[] = [];
    const push = (name: string, type: 'counter' | 'gauge', help: string, value: number) => {
      lines.push(`# HELP hotlink_${name} ${help}`, `# TYPE hotlink_${name} ${type}`, `hotlink_${name} ${value}`, '');
    };

    push('cache_hits_total', 'counter', 'Redirects served from cache', current.cacheHits);
    push('cache_misses_total', 'counter', 'Redirects resolved upstream', current.cacheMisses);
    push('cache_admissions_total', 'counter', 'Misses admitted into the cache', current.cacheAdmissions);
    push('cache_skips_total', 'counter', 'Misses below the popularity threshold', current.cacheSkips);
    push('cache_invalidations_total', 'counter', 'Short codes invalidated', current.invalidations);
    push('rate_limit_allowed_total', 'counter', 'Requests let through by the rate limiter', current.rateLimitAllowed);
    push('rate_limit_blocks_total', 'counter', 'Requests rejected by the rate limiter', current.rateLimitBlocks);

    if (sources.manager) {
      const stats = sources.manager.stats();
      push('cache_size', 'gauge', 'Entries currently cached', stats.size);
      push('cache_max_size', 'gauge', 'Cache capacity', stats.maxSize);
      push('cache_hit_rate', 'gauge', 'Cache hit rate (percent)', stats.hitRate);
    }
    if (sources.limiter) {
      push('rate_limit_buckets', 'gauge', 'Live token buckets', sources.limiter.size());
    }

    return lines.join('\n');
  }
}

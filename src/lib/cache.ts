import type { Request, Response, NextFunction } from 'express';
import type { ResolvedDestination } from '../types';
import type { PopularityGatedCacheManager } from './popularityCache';
import type { MetricsCollector } from './metrics';

export type RedirectCacheOptions = {
  enabled?: boolean; // false resolves every request upstream without touching the cache
  manager: PopularityGatedCacheManager;
  // Looks the code up in the host's own store; undefined means unknown code.
  resolve: (code: string, req: Request) => Promise<ResolvedDestination | undefined> | ResolvedDestination | undefined;
  // Counts a redirect served from cache against the host's usage counter.
  recordUse?: (code: string, req: Request) => Promise<void> | void;
  param?: string;
  ttlSeconds?: number;
  statusCode?: 301 | 302 | 307 | 308;
  metrics?: MetricsCollector;
  hooks?: {
    onHit?: (info: { code: string; req: Request }) => void;
    onMiss?: (info: { code: string; admitted: boolean; usageCount: number; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

export function cachedRedirect(options: RedirectCacheOptions) {
  const { enabled = true, manager, resolve, recordUse, param = 'code', ttlSeconds, statusCode = 302, metrics, hooks } = options;

  return async function redirectCacheMiddleware(req: Request, res: Response, next: NextFunction) {
    const code = req.params[param];
    if (!code) return next();

    try {
      if (!enabled) {
        const resolved = await resolve(code, req);
        if (!resolved) return next();
        res.redirect(statusCode, resolved.destination);
        return;
      }

      const cached = manager.lookup(code);
      if (cached !== undefined) {
        await recordUse?.(code, req);
        metrics?.recordCacheHit();
        hooks?.onHit?.({ code, req });
        res.setHeader('X-Cache', 'HIT');
        res.redirect(statusCode, cached);
        return;
      }

      const resolved = await resolve(code, req);
      if (!resolved) return next();

      const admitted = manager.admit(code, resolved.destination, resolved.usageCount, ttlSeconds) === 'admitted';
      metrics?.recordCacheMiss(admitted);
      hooks?.onMiss?.({ code, admitted, usageCount: resolved.usageCount, req });
      res.setHeader('X-Cache', 'MISS');
      res.redirect(statusCode, resolved.destination);
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}

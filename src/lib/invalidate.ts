import type { Request, Response, NextFunction } from 'express';
import type { PopularityGatedCacheManager } from './popularityCache';
import type { MetricsCollector } from './metrics';

export type InvalidateOptions = {
  manager: PopularityGatedCacheManager;
  param?: string;
  resolveCodes?: (req: Request) => string[] | Promise<string[]>;
  metrics?: MetricsCollector;
  hooks?: {
    onInvalidated?: (info: { codes: string[]; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

/**
 * Drops cached destinations for the short codes a mutating request touches.
 * Mount it in front of update/delete handlers. Invalidation happens once the
 * handler answers with a 2xx, right before the response goes out, so a
 * redirect that re-admitted the old destination mid-update is dropped too.
 */
export function invalidateShortCode(options: InvalidateOptions) {
  const { manager, param = 'code', resolveCodes, metrics, hooks } = options;

  return async function invalidateMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      const fromParam = req.params[param];
      const extra = (await resolveCodes?.(req)) ?? [];
      const codes = [...new Set([...(fromParam ? [fromParam] : []), ...extra].filter(Boolean))];
      if (codes.length === 0) return next();

      let settled = false;
      const settle = () => {
        if (settled) return;
        settled = true;
        if (res.statusCode < 200 || res.statusCode >= 300) return;
        for (const code of codes) manager.invalidate(code);
        metrics?.recordInvalidation(codes.length);
        hooks?.onInvalidated?.({ codes, req });
      };

      const originalEnd = res.end;
      res.end = function (this: Response, ...args: unknown[]) {
        settle();
        return Reflect.apply(originalEnd, this, args);
      } as Response['end'];

      next();
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}

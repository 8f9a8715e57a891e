import type { Request, Response, NextFunction } from 'express';
import type { KeyedRateLimiter } from './keyedRateLimiter';
import type { MetricsCollector } from './metrics';
import { keyByClientIp, type KeyGenerator } from './keys';

export type RateLimitOptions = {
  limiter: KeyedRateLimiter;
  keyGenerator?: KeyGenerator;
  skipPaths?: Array<string | RegExp>;
  metrics?: MetricsCollector;
  hooks?: {
    onAllowed?: (info: { key: string; remaining: number; req: Request }) => void;
    onBlocked?: (info: { key: string; req: Request }) => void;
    onError?: (info: { error: unknown; req: Request }) => void;
  };
};

export function rateLimit(options: RateLimitOptions) {
  const {
    limiter,
    keyGenerator = keyByClientIp(),
    skipPaths = ['/health', '/metrics'],
    metrics,
    hooks,
  } = options;

  const skipped = (path: string) =>
    skipPaths.some((p) => (typeof p === 'string' ? path === p : p.test(path)));

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    if (skipped(req.path)) return next();

    try {
      const key = keyGenerator(req);
      res.setHeader('X-RateLimit-Limit', String(limiter.limit));
      res.setHeader('X-RateLimit-Window', String(limiter.windowSeconds));

      if (!limiter.isAllowed(key)) {
        metrics?.recordRateLimitBlock();
        hooks?.onBlocked?.({ key, req });
        res.setHeader('X-RateLimit-Remaining', '0');
        res.status(429).json({ error: 'Too Many Requests', code: 'RATE_LIMIT_EXCEEDED' });
        return;
      }

      const remaining = limiter.remaining(key);
      res.setHeader('X-RateLimit-Remaining', String(remaining));
      metrics?.recordRateLimitAllowed();
      hooks?.onAllowed?.({ key, remaining, req });
      next();
    } catch (error) {
      hooks?.onError?.({ error, req });
      next(error);
    }
  };
}

import type { Request, Response, NextFunction } from 'express';
import type { MetricsCollector, MetricsSources } from './metrics';

export interface PrometheusOptions extends MetricsSources {
  collector: MetricsCollector;
  path?: string;
}

export function prometheusMetrics(options: PrometheusOptions) {
  const { collector, path = '/metrics', manager, limiter } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (req.path !== path) return next();
    try {
      const body = collector.getPrometheusMetrics({ manager, limiter });
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
      res.status(200).send(body);
    } catch (error) {
      next(error);
    }
  };
}

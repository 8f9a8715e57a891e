import express from 'express';
import {
  KeyedRateLimiter,
  MetricsCollector,
  PopularityGatedCacheManager,
  cachedRedirect,
  createLogger,
  invalidateShortCode,
  keyByHeader,
  loadConfig,
  prometheusMetrics,
  rateLimit,
  startMaintenance,
} from '../../src';

// Demo shortener: links live in a Map standing in for the host's database.
type Link = { destination: string; clicks: number };

const config = loadConfig();
const logger = createLogger({ level: config.logLevel, service: 'example' });
const metrics = new MetricsCollector();
const manager = new PopularityGatedCacheManager({
  maxSize: config.cache.maxSize,
  defaultTtlSeconds: config.cache.defaultTtlSeconds,
  popularityThreshold: config.cache.popularityThreshold,
});
const limiter = new KeyedRateLimiter({
  requestsPerWindow: config.rateLimit.requestsPerWindow,
  windowSeconds: config.rateLimit.windowSeconds,
});
const maintenance = startMaintenance({
  manager,
  limiter,
  intervalSeconds: config.maintenanceIntervalSeconds,
  logger,
});

const links = new Map<string, Link>([
  ['docs', { destination: 'https://example.com/docs', clicks: 0 }],
  ['blog', { destination: 'https://example.com/blog', clicks: 0 }],
]);

const app = express();
app.use(express.json());

app.use(prometheusMetrics({ collector: metrics, manager, limiter }));

if (config.rateLimit.enabled) {
  app.use(
    rateLimit({
      limiter,
      metrics,
      keyGenerator: keyByHeader('x-api-key', { fallbackToIp: true }),
      hooks: {
        onBlocked: ({ key, req }) => logger.warn('rate limit exceeded', { key, path: req.path }),
        onError: ({ error }) => logger.error('rate limit error', { error: String(error) }),
      },
    }),
  );
}

app.get('/health', (_req, res) => {
  res.json({ status: 'ok', cache: manager.stats(), buckets: limiter.size() });
});

app.put(
  '/links/:code',
  invalidateShortCode({
    manager,
    metrics,
    hooks: { onInvalidated: ({ codes }) => logger.info('cache invalidated', { codes }) },
  }),
  (req, res) => {
    const destination = typeof req.body?.destination === 'string' ? req.body.destination : undefined;
    if (!destination) {
      res.status(400).json({ error: 'destination is required' });
      return;
    }
    const existing = links.get(req.params.code);
    links.set(req.params.code, { destination, clicks: existing?.clicks ?? 0 });
    res.json({ code: req.params.code, destination });
  },
);

app.delete('/links/:code', invalidateShortCode({ manager, metrics }), (req, res) => {
  if (!links.delete(req.params.code)) {
    res.status(404).json({ error: 'Not Found' });
    return;
  }
  res.status(204).end();
});

const redirect = cachedRedirect({
  enabled: config.cache.enabled,
  manager,
  metrics,
  resolve: (code) => {
    const link = links.get(code);
    if (!link) return undefined;
    link.clicks += 1;
    return { destination: link.destination, usageCount: link.clicks };
  },
  recordUse: (code) => {
    const link = links.get(code);
    if (link) link.clicks += 1;
  },
  hooks: {
    onMiss: ({ code, admitted, usageCount }) => logger.debug('cache miss', { code, admitted, usageCount }),
    onError: ({ error }) => logger.error('redirect failed', { error: String(error) }),
  },
});

app.get('/:code', redirect, (_req, res) => {
  res.status(404).json({ error: 'Not Found' });
});

const server = app.listen(config.port, () => {
  logger.info('example listening', { port: config.port, cache: config.cache, rateLimit: config.rateLimit });
});

process.on('SIGTERM', () => {
  maintenance.stop();
  server.close();
});

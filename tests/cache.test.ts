import express from 'express';
import request from 'supertest';
import { cachedRedirect } from '../src/lib/cache';
import { PopularityGatedCacheManager } from '../src/lib/popularityCache';
import { MetricsCollector } from '../src/lib/metrics';

function buildApp(options: { threshold: number; enabled?: boolean }) {
  const clicks = new Map<string, number>();
  const links = new Map<string, string>([['docs', 'https://example.com/docs']]);
  let resolverCalls = 0;
  const events: string[] = [];
  const manager = new PopularityGatedCacheManager({
    maxSize: 10,
    defaultTtlSeconds: 60,
    popularityThreshold: options.threshold,
  });
  const metrics = new MetricsCollector();

  const app = express();
  app.get(
    '/:code',
    cachedRedirect({
      enabled: options.enabled,
      manager,
      metrics,
      resolve: (code) => {
        resolverCalls += 1;
        const destination = links.get(code);
        if (!destination) return undefined;
        const usageCount = (clicks.get(code) ?? 0) + 1;
        clicks.set(code, usageCount);
        return { destination, usageCount };
      },
      hooks: {
        onHit: ({ code }) => events.push(`hit:${code}`),
        onMiss: ({ code, admitted, usageCount }) => events.push(`miss:${code}:${usageCount}:${admitted}`),
      },
    }),
    (_req, res) => {
      res.status(404).json({ error: 'Not Found' });
    },
  );

  return { app, manager, metrics, events, resolverCalls: () => resolverCalls };
}

describe('cachedRedirect middleware', () => {
  test('admits a code once it is popular and then serves it from cache', async () => {
    const { app, events, metrics, resolverCalls } = buildApp({ threshold: 2 });

    const r1 = await request(app).get('/docs');
    const r2 = await request(app).get('/docs');
    const r3 = await request(app).get('/docs');

    expect(r1.status).toBe(302);
    expect(r1.headers.location).toBe('https://example.com/docs');
    expect(r1.headers['x-cache']).toBe('MISS');
    expect(r2.headers['x-cache']).toBe('MISS');
    expect(r3.status).toBe(302);
    expect(r3.headers['x-cache']).toBe('HIT');
    expect(r3.headers.location).toBe('https://example.com/docs');

    expect(resolverCalls()).toBe(2);
    expect(events).toEqual(['miss:docs:1:false', 'miss:docs:2:true', 'hit:docs']);
    expect(metrics.getCurrentMetrics()).toMatchObject({
      cacheHits: 1,
      cacheMisses: 2,
      cacheAdmissions: 1,
      cacheSkips: 1,
    });
  });

  test('redirects served from cache still count as uses', async () => {
    const clicks = new Map<string, number>();
    const bump = (code: string) => {
      const usageCount = (clicks.get(code) ?? 0) + 1;
      clicks.set(code, usageCount);
      return usageCount;
    };
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    const app = express();
    app.get(
      '/:code',
      cachedRedirect({
        manager,
        resolve: (code) => ({ destination: 'https://example.com/docs', usageCount: bump(code) }),
        recordUse: (code) => {
          bump(code);
        },
      }),
    );

    const r1 = await request(app).get('/docs');
    const r2 = await request(app).get('/docs');
    const r3 = await request(app).get('/docs');

    expect(r1.headers['x-cache']).toBe('MISS');
    expect(r2.headers['x-cache']).toBe('HIT');
    expect(r3.headers['x-cache']).toBe('HIT');
    expect(clicks.get('docs')).toBe(3);
  });

  test('unknown codes fall through to the next handler', async () => {
    const { app, manager } = buildApp({ threshold: 0 });

    const r = await request(app).get('/nope');
    expect(r.status).toBe(404);
    expect(r.body).toEqual({ error: 'Not Found' });
    expect(manager.stats().size).toBe(0);
  });

  test('disabled cache resolves every request upstream', async () => {
    const { app, manager, resolverCalls } = buildApp({ threshold: 0, enabled: false });

    await request(app).get('/docs');
    const r = await request(app).get('/docs');

    expect(r.status).toBe(302);
    expect(r.headers['x-cache']).toBeUndefined();
    expect(resolverCalls()).toBe(2);
    expect(manager.stats()).toMatchObject({ size: 0, totalRequests: 0 });
  });

  test('resolver failures reach the error handler', async () => {
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    const errors: unknown[] = [];
    const app = express();
    app.get(
      '/:code',
      cachedRedirect({
        manager,
        resolve: async () => {
          throw new Error('database down');
        },
        hooks: { onError: ({ error }) => errors.push(error) },
      }),
    );

    const r = await request(app).get('/docs');
    expect(r.status).toBe(500);
    expect(errors).toHaveLength(1);
  });
});

import express from 'express';
import request from 'supertest';
import { cachedRedirect } from '../src/lib/cache';
import { invalidateShortCode } from '../src/lib/invalidate';
import { PopularityGatedCacheManager } from '../src/lib/popularityCache';

describe('invalidateShortCode middleware', () => {
  test('an update drops the cached destination before responding', async () => {
    const links = new Map<string, string>([['docs', 'https://example.com/v1']]);
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    const invalidated: string[][] = [];

    const app = express();
    app.use(express.json());
    app.get(
      '/:code',
      cachedRedirect({
        manager,
        resolve: (code) => {
          const destination = links.get(code);
          return destination ? { destination, usageCount: 1 } : undefined;
        },
      }),
    );
    app.put(
      '/links/:code',
      invalidateShortCode({ manager, hooks: { onInvalidated: ({ codes }) => invalidated.push(codes) } }),
      (req, res) => {
        links.set(req.params.code, req.body.destination);
        res.json({ ok: true });
      },
    );

    const a1 = await request(app).get('/docs');
    const a2 = await request(app).get('/docs');
    expect(a1.headers['x-cache']).toBe('MISS');
    expect(a2.headers['x-cache']).toBe('HIT');

    const p = await request(app).put('/links/docs').send({ destination: 'https://example.com/v2' });
    expect(p.status).toBe(200);
    expect(invalidated).toEqual([['docs']]);

    const a3 = await request(app).get('/docs');
    expect(a3.headers['x-cache']).toBe('MISS');
    expect(a3.headers.location).toBe('https://example.com/v2');
  });

  test('a redirect during a slow update cannot re-admit the old destination', async () => {
    const links = new Map<string, string>([['docs', 'https://example.com/v1']]);
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    let release: () => void = () => {};
    const writeAllowed = new Promise<void>((resolve) => {
      release = resolve;
    });

    const app = express();
    app.use(express.json());
    app.get(
      '/:code',
      cachedRedirect({
        manager,
        resolve: (code) => {
          const destination = links.get(code);
          return destination ? { destination, usageCount: 1 } : undefined;
        },
      }),
    );
    app.put('/links/:code', invalidateShortCode({ manager }), async (req, res) => {
      await writeAllowed;
      links.set(req.params.code, req.body.destination);
      res.json({ ok: true });
    });

    const update = request(app).put('/links/docs').send({ destination: 'https://example.com/v2' }).then((r) => r);

    const during = await request(app).get('/docs');
    expect(during.headers['x-cache']).toBe('MISS');
    expect(during.headers.location).toBe('https://example.com/v1');
    expect(manager.lookup('docs')).toBe('https://example.com/v1');

    release();
    const p = await update;
    expect(p.status).toBe(200);

    const after = await request(app).get('/docs');
    expect(after.headers['x-cache']).toBe('MISS');
    expect(after.headers.location).toBe('https://example.com/v2');
  });

  test('a failed mutation leaves the cache alone', async () => {
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    manager.admit('docs', 'https://example.com/v1', 1);
    const invalidated: string[][] = [];

    const app = express();
    app.delete(
      '/links/:code',
      invalidateShortCode({ manager, hooks: { onInvalidated: ({ codes }) => invalidated.push(codes) } }),
      (_req, res) => {
        res.status(409).json({ error: 'Conflict' });
      },
    );

    const r = await request(app).delete('/links/docs');
    expect(r.status).toBe(409);
    expect(invalidated).toEqual([]);
    expect(manager.lookup('docs')).toBe('https://example.com/v1');
  });

  test('extra codes can be resolved from the request', async () => {
    const manager = new PopularityGatedCacheManager({ maxSize: 10, defaultTtlSeconds: 60, popularityThreshold: 0 });
    manager.admit('a', 'https://example.com/a', 1);
    manager.admit('b', 'https://example.com/b', 1);
    manager.admit('c', 'https://example.com/c', 1);

    const app = express();
    app.use(express.json());
    app.post(
      '/purge',
      invalidateShortCode({
        manager,
        resolveCodes: (req) => (Array.isArray(req.body?.codes) ? req.body.codes : []),
      }),
      (_req, res) => res.json({ ok: true }),
    );

    const r = await request(app).post('/purge').send({ codes: ['a', 'b', 'a'] });
    expect(r.status).toBe(200);
    expect(manager.lookup('a')).toBeUndefined();
    expect(manager.lookup('b')).toBeUndefined();
    expect(manager.lookup('c')).toBe('https://example.com/c');
  });
});

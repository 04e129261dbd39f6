import { describe, expect, it } from 'vitest';
import { RateLimiter, type RateLimiterOptions } from './rate-limiter.js';
import { MemoryCache } from '../cache/index.js';
import { CancelledError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { BrokenCache } from '../testing/index.js';
import type { TtlCache } from '../cache/index.js';

const logger = createSilentLogger();

function createLimiter(
  overrides: Partial<RateLimiterOptions> = {},
  cache: TtlCache = new MemoryCache()
): RateLimiter {
  return new RateLimiter(
    cache,
    { enabled: true, stateTtl: 3600, defaultCrawlDelay: 2.0, ...overrides },
    logger
  );
}

describe('RateLimiter', () => {
  it('spaces requests to one domain by the default delay', async () => {
    const limiter = createLimiter();

    const first = await limiter.wait('example.com');
    const second = await limiter.wait('example.com');

    expect(second - first).toBeGreaterThanOrEqual(2000);
  });

  it('serializes concurrent callers for the same domain', async () => {
    const limiter = createLimiter();

    const starts = await Promise.all([
      limiter.wait('example.com', 0.2),
      limiter.wait('example.com', 0.2),
      limiter.wait('example.com', 0.2),
    ]);

    expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(200);
    expect(starts[2] - starts[1]).toBeGreaterThanOrEqual(200);
  });

  it('spaces limiters that share one cache', async () => {
    const cache = new MemoryCache();
    const a = createLimiter({ defaultCrawlDelay: 0.5 }, cache);
    const b = createLimiter({ defaultCrawlDelay: 0.5 }, cache);
    const primed = await a.wait('example.com');

    const starts = await Promise.all([a.wait('example.com'), b.wait('example.com')]);
    const [first, second] = [...starts].sort((x, y) => x - y);

    expect(first - primed).toBeGreaterThanOrEqual(500);
    expect(second - first).toBeGreaterThanOrEqual(500);
    expect((await b.getStats('example.com')).requestCount).toBe(3);
  });

  it('does not delay other domains', async () => {
    const limiter = createLimiter();
    await limiter.wait('a.example.com', 1);

    const before = Date.now();
    await limiter.wait('b.example.com', 1);

    expect(Date.now() - before).toBeLessThan(500);
  });

  it('treats a stored crawl delay as a floor', async () => {
    const limiter = createLimiter();
    await limiter.setCrawlDelay('example.com', 0.3);

    const first = await limiter.wait('example.com', 0.1);
    const second = await limiter.wait('example.com', 0.1);

    expect(second - first).toBeGreaterThanOrEqual(300);
    expect(await limiter.getStats('example.com')).toMatchObject({
      domain: 'example.com',
      requestCount: 2,
      crawlDelay: 0.3,
    });
  });

  it('reports and resets per-domain state', async () => {
    const limiter = createLimiter();
    expect(await limiter.isRateLimited('example.com')).toBe(false);

    await limiter.wait('example.com', 1);
    expect(await limiter.isRateLimited('example.com')).toBe(true);
    const stats = await limiter.getStats('example.com');
    expect(stats.requestCount).toBe(1);
    expect(stats.lastRequestTime).toBeInstanceOf(Date);

    await limiter.resetStats('example.com');
    expect(await limiter.isRateLimited('example.com')).toBe(false);
    expect(await limiter.getStats('example.com')).toEqual({
      domain: 'example.com',
      requestCount: 0,
      crawlDelay: 2.0,
    });
  });

  it('stops waiting when the signal aborts', async () => {
    const limiter = createLimiter();
    await limiter.wait('example.com', 5);

    const controller = new AbortController();
    const waiting = limiter.wait('example.com', 5, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect((await limiter.getStats('example.com')).requestCount).toBe(1);
    expect(await limiter.isRateLimited('example.com')).toBe(true);
  });

  it('gives the slot back when a queued wait is cancelled', async () => {
    const limiter = createLimiter();
    const first = await limiter.wait('example.com', 0.2);

    const controller = new AbortController();
    const cancelled = limiter.wait('example.com', 0.2, controller.signal);
    setTimeout(() => controller.abort(), 20);
    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);

    const next = await limiter.wait('example.com', 0.2);
    expect(next - first).toBe(200);
  });

  it('never waits when disabled', async () => {
    const limiter = createLimiter({ enabled: false });

    const before = Date.now();
    await limiter.wait('example.com', 5);
    await limiter.wait('example.com', 5);

    expect(Date.now() - before).toBeLessThan(500);
    expect(await limiter.isRateLimited('example.com')).toBe(false);
  });

  it('lets requests through when the cache fails', async () => {
    const limiter = createLimiter({}, new BrokenCache());

    const before = Date.now();
    await limiter.wait('example.com', 5);
    await limiter.wait('example.com', 5);

    expect(Date.now() - before).toBeLessThan(500);
    expect((await limiter.getStats('example.com')).requestCount).toBe(0);
  });
});

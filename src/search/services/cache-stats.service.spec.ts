import { Logger } from '@nestjs/common';
import { CacheStatsService } from './cache-stats.service';
import {
  createSearchTestContext,
  type SearchTestContext,
} from '../../../test/support/search-testing';
import { FailingCacheBackend } from '../../../test/support/failing-cache.backend';

describe('CacheStatsService', () => {
  let ctx: SearchTestContext;
  let stats: CacheStatsService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    ctx = await createSearchTestContext({ extraProviders: [CacheStatsService] });
    stats = ctx.moduleRef.get(CacheStatsService);
  });

  it('reports per-namespace counters, key count and popular queries', async () => {
    await ctx.workflow.search('3 bed in Austin');
    await ctx.workflow.search('3 bed in Austin');
    await ctx.workflow.search('condo in Miami');

    const report = await stats.getCacheStats();

    expect(report.backend).toBe('memory');
    expect(report.namespaces.filter_plan).toEqual({
      hits: 1,
      misses: 2,
      hitRate: 33.33,
      ttlSeconds: 600,
    });
    expect(report.namespaces.result).toEqual({
      hits: 1,
      misses: 2,
      hitRate: 33.33,
      ttlSeconds: 300,
    });
    expect(report.namespaces.embedding).toEqual({
      hits: 0,
      misses: 2,
      hitRate: 0,
      ttlSeconds: 3600,
    });
    expect(report.popularQueries).toEqual([
      { query: 'condo in Miami', count: 1 },
      { query: '3 bed in Austin', count: 1 },
    ]);
    // 2 plans, 2 embeddings, 2 results, 5 counters, 1 popular set, 2 display forms
    expect(report.totalKeys).toBe(14);
  });

  it('clears a namespace through the coordinator', async () => {
    await ctx.workflow.search('3 bed in Austin');

    expect(await stats.clearCache('result')).toBe(1);

    const repeat = await ctx.workflow.search('3 bed in Austin');
    expect(repeat.servedFrom).toBe('search_engine');
  });

  it('is healthy when cache and engine respond', async () => {
    const health = await stats.getHealth();

    expect(health.status).toBe('healthy');
    expect(health.cache).toMatchObject({
      status: 'healthy',
      backend: 'memory',
      connected: true,
    });
    expect(health.searchEngine).toEqual({ connected: true });
  });

  it('is unhealthy when the engine is down', async () => {
    ctx.engine.healthy = false;

    expect((await stats.getHealth()).status).toBe('unhealthy');
  });

  it('is degraded when only the cache backend is down', async () => {
    const degraded = await createSearchTestContext({
      backend: new FailingCacheBackend(),
      extraProviders: [CacheStatsService],
    });

    const health = await degraded.moduleRef.get(CacheStatsService).getHealth();

    expect(health.status).toBe('degraded');
    expect(health.cache).toEqual({
      status: 'unhealthy',
      backend: 'redis',
      connected: false,
      error: 'Cache backend ping failed: connection refused',
    });
  });
});

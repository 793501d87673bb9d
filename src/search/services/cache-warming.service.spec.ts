import { Logger } from '@nestjs/common';
import { CacheWarmingService } from './cache-warming.service';
import { CacheMaintenanceService } from './cache-maintenance.service';
import {
  createSearchTestContext,
  type SearchTestContext,
} from '../../../test/support/search-testing';
import { MemoryCacheBackend } from '../cache/memory-cache.backend';
import { makeSearchResult } from '../../../test/support/search-fixtures';

describe('cache warming and maintenance', () => {
  let ctx: SearchTestContext;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  describe('CacheWarmingService', () => {
    let warming: CacheWarmingService;

    beforeEach(async () => {
      ctx = await createSearchTestContext({
        extraProviders: [CacheWarmingService],
      });
      warming = ctx.moduleRef.get(CacheWarmingService);
    });

    it('replays popular queries into the result cache', async () => {
      await ctx.workflow.search('3 bed in Austin');
      await ctx.workflow.search('condo in Miami');
      await ctx.cache.clear('result');

      const report = await warming.warmPopularQueries(5);

      expect(report).toMatchObject({ requested: 2, warmed: 2, failed: 0 });
      expect(ctx.engine.queries).toHaveLength(4);

      const repeat = await ctx.workflow.search('condo in Miami');
      expect(repeat.servedFrom).toBe('result_cache');
    });

    it('counts failed replays and carries on', async () => {
      await ctx.workflow.search('3 bed in Austin');
      await ctx.cache.clear('result');
      ctx.engine.failWith = 'unavailable';

      const report = await warming.warmPopularQueries();

      expect(report).toMatchObject({ requested: 1, warmed: 0, failed: 1 });
    });

    it('does nothing on schedule unless enabled', async () => {
      await ctx.workflow.search('3 bed in Austin');
      await ctx.cache.clear('result');

      await warming.scheduledWarming();

      expect(ctx.engine.queries).toHaveLength(1);
    });

    it('runs on schedule when enabled', async () => {
      ctx = await createSearchTestContext({
        config: { CACHE_WARMING_ENABLED: true },
        extraProviders: [CacheWarmingService],
      });
      await ctx.workflow.search('3 bed in Austin');
      await ctx.cache.clear('result');

      await ctx.moduleRef.get(CacheWarmingService).scheduledWarming();

      expect(ctx.engine.queries).toHaveLength(2);
    });
  });

  describe('CacheMaintenanceService', () => {
    it('reports the number of expired entries swept', async () => {
      let clock = 1_000_000;
      ctx = await createSearchTestContext({
        backend: new MemoryCacheBackend({ now: () => clock }),
        config: { CACHE_RESULT_TTL: 1 },
        extraProviders: [CacheMaintenanceService],
      });
      const result = makeSearchResult();
      await ctx.cache.setResult('q', 1, result.filterPlan, result);
      clock += 5_000;

      const removed = await ctx.moduleRef.get(CacheMaintenanceService).cleanupExpired();

      expect(removed).toBe(1);
    });
  });
});

import { Logger } from '@nestjs/common';
import { compileSearchGraph } from './search-workflow.service';
import { createInitialState, type SearchStage } from './state/search-state';
import { FilterParserService } from '../parser/filter-parser.service';
import { EmbeddingGatewayService } from '../services/embedding-gateway.service';
import { SearchEngineError } from '../errors/search.errors';
import { PROPERTY_FIELDS } from '../parser/property-fields';
import {
  createSearchTestContext,
  type SearchTestContext,
} from '../../../test/support/search-testing';
import { FailingCacheBackend } from '../../../test/support/failing-cache.backend';

describe('SearchWorkflowService', () => {
  let ctx: SearchTestContext;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    ctx = await createSearchTestContext();
  });

  describe('hybrid path', () => {
    it('serves a cold query from the engine with a vector clause', async () => {
      const result = await ctx.workflow.search('3 bed in Austin', 1, 10, true);

      expect(result.servedFrom).toBe('search_engine');
      expect(result.performance.method).toBe('hybrid_semantic');
      expect(result.performance.servedFrom).toBe('search_engine');
      expect(result.performance.planFromCache).toBe(false);
      expect(result.performance.embeddingFromCache).toBe(false);
      expect(result.hits.map((hit) => hit.id)).toEqual([
        'rec-1', 'rec-2', 'rec-3', 'rec-4', 'rec-5',
        'rec-6', 'rec-7', 'rec-8', 'rec-9', 'rec-10',
      ]);
      expect(result.totalMatches).toBe(30);

      expect(ctx.engine.queries).toHaveLength(1);
      expect(ctx.engine.queries[0].vector).toEqual({
        field: 'description_vector',
        vector: expect.any(Array),
        k: 100,
      });
      expect(ctx.engine.queries[0].timeoutMs).toBe(1000);
    });

    it('combines the plan with the vector clause', async () => {
      await ctx.workflow.search('3+ bed under 500k in Austin, TX residential');

      const [query] = ctx.engine.queries;
      expect(query.clause).toEqual({
        kind: 'bool',
        must: [
          { kind: 'term', field: PROPERTY_FIELDS.CITY, value: 'AUSTIN' },
          { kind: 'term', field: PROPERTY_FIELDS.STATE, value: 'TX' },
          { kind: 'term', field: PROPERTY_FIELDS.LAND_USE, value: 'RESIDENTIAL' },
        ],
        filter: [
          { kind: 'range', field: PROPERTY_FIELDS.BEDROOMS, bound: 'gte', value: 3 },
          {
            kind: 'nested_range',
            path: PROPERTY_FIELDS.TAX_ASSESSMENT_PATH,
            field: PROPERTY_FIELDS.ASSESSED_VALUE,
            bound: 'lte',
            value: 500000,
          },
        ],
        should: [],
      });
      expect(query.sort).toBeNull();
    });

    it('passes an explicit sort through to the engine', async () => {
      await ctx.workflow.search('largest homes in Dallas');

      expect(ctx.engine.queries[0].sort).toEqual([
        { field: PROPERTY_FIELDS.LIVING_AREA_SQFT, order: 'desc' },
      ]);
      expect(ctx.engine.queries[0].vector).not.toBeNull();
    });
  });

  describe('result cache', () => {
    it('serves an identical repeat from the result cache', async () => {
      const first = await ctx.workflow.search('3 bed in Austin', 1, 20, true);
      const second = await ctx.workflow.search('3 bed in Austin', 1, 20, true);

      expect(second.servedFrom).toBe('result_cache');
      expect(second.performance.servedFrom).toBe('result_cache');
      expect(second.performance.method).toBe('hybrid_semantic');
      expect(second.performance.planFromCache).toBe(true);
      expect(second.hits).toEqual(first.hits);
      expect(second.totalMatches).toBe(first.totalMatches);
      expect(second.filterPlan).toEqual(first.filterPlan);
      expect(ctx.engine.queries).toHaveLength(1);
      expect(ctx.embeddings.calls).toEqual(['3 bed in Austin']);
    });

    it('shares cache entries across letter case', async () => {
      await ctx.workflow.search('3 bed in Austin');
      const repeat = await ctx.workflow.search('  3 BED IN AUSTIN');

      expect(repeat.servedFrom).toBe('result_cache');
    });

    it('never caches or serves later pages', async () => {
      await ctx.workflow.search('3 bed in Austin', 1, 10);
      const second = await ctx.workflow.search('3 bed in Austin', 2, 10);
      const repeat = await ctx.workflow.search('3 bed in Austin', 2, 10);

      expect(second.servedFrom).toBe('search_engine');
      expect(repeat.servedFrom).toBe('search_engine');
      expect(repeat.hits[0].id).toBe('rec-11');
      expect(ctx.engine.queries).toHaveLength(3);
    });

    it('bypasses the result cache when caching is off', async () => {
      await ctx.workflow.search('3 bed in Austin', 1, 20, false);
      const repeat = await ctx.workflow.search('3 bed in Austin', 1, 20, false);
      const cachedRun = await ctx.workflow.search('3 bed in Austin', 1, 20, true);

      expect(repeat.servedFrom).toBe('search_engine');
      expect(cachedRun.servedFrom).toBe('search_engine');
      expect(ctx.engine.queries).toHaveLength(3);
    });

    it('trims a cached page to a smaller requested size', async () => {
      await ctx.workflow.search('3 bed in Austin', 1, 20);
      const smaller = await ctx.workflow.search('3 bed in Austin', 1, 5);

      expect(smaller.servedFrom).toBe('result_cache');
      expect(smaller.size).toBe(5);
      expect(smaller.hits).toHaveLength(5);
    });

    it('recomputes when a larger page than the cached one is requested', async () => {
      await ctx.workflow.search('3 bed in Austin', 1, 5);
      const larger = await ctx.workflow.search('3 bed in Austin', 1, 20);

      expect(larger.servedFrom).toBe('search_engine');
      expect(larger.hits).toHaveLength(20);
    });
  });

  describe('degraded paths', () => {
    it('falls back to keyword-only when embedding fails', async () => {
      ctx.embeddings.failWith = new Error('connect ECONNREFUSED');

      const result = await ctx.workflow.search('3 bed in Austin');

      expect(result.performance.method).toBe('keyword_only');
      expect(result.servedFrom).toBe('search_engine');
      expect(ctx.engine.queries[0].vector).toBeNull();
      expect(ctx.engine.queries[0].timeoutMs).toBe(2000);
    });

    it('matches everything when the fallback plan is empty', async () => {
      ctx.embeddings.failWith = new Error('timeout');

      await ctx.workflow.search('show me something nice');

      expect(ctx.engine.queries[0].clause).toEqual({ kind: 'match_all' });
    });

    it('caches keyword-only results under the same rules', async () => {
      ctx.embeddings.failWith = new Error('timeout');
      await ctx.workflow.search('3 bed in Austin');

      const repeat = await ctx.workflow.search('3 bed in Austin');

      expect(repeat.servedFrom).toBe('result_cache');
      expect(repeat.performance.method).toBe('keyword_only');
    });

    it('surfaces engine failures without a fallback', async () => {
      ctx.engine.failWith = 'query timed out';

      await expect(ctx.workflow.search('3 bed in Austin')).rejects.toThrow(
        new SearchEngineError('query timed out'),
      );
      expect(ctx.engine.queries).toHaveLength(1);
    });

    it('searches normally when the cache backend is down', async () => {
      const degraded = await createSearchTestContext({
        backend: new FailingCacheBackend(),
      });

      const first = await degraded.workflow.search('3 bed in Austin');
      const second = await degraded.workflow.search('3 bed in Austin');

      expect(first.performance.method).toBe('hybrid_semantic');
      expect(second.servedFrom).toBe('search_engine');
      expect(degraded.engine.queries).toHaveLength(2);
    });
  });

  it('clamps page and size', async () => {
    const result = await ctx.workflow.search('homes', 0, 500);

    expect(result.page).toBe(1);
    expect(result.size).toBe(100);
    expect(ctx.engine.queries[0].limit).toBe(100);
    expect(ctx.engine.queries[0].offset).toBe(0);
  });

  describe('stage path', () => {
    async function runGraph(useCache: boolean): Promise<{
      stages: SearchStage[];
      runAgain: () => Promise<SearchStage[]>;
    }> {
      const graph = compileSearchGraph({
        parser: ctx.moduleRef.get(FilterParserService),
        cache: ctx.cache,
        embeddingGateway: ctx.moduleRef.get(EmbeddingGatewayService),
        engine: ctx.engine,
        hybrid: { vectorField: 'v', candidates: 10, timeoutMs: 1000 },
        keyword: { timeoutMs: 2000 },
      });
      const run = async () => {
        const state = await graph.invoke(
          createInitialState(
            { query: 'homes in Austin', page: 1, size: 10, useCache },
            'homes in austin',
          ),
        );
        return state.stageHistory;
      };

      return { stages: await run(), runAgain: run };
    }

    it('walks the hybrid path and then exits early on a cache hit', async () => {
      const { stages, runAgain } = await runGraph(true);

      expect(stages).toEqual([
        'START',
        'PLAN_READY',
        'EMBEDDING_ATTEMPTED',
        'HYBRID_QUERY',
        'EXECUTED',
        'CACHED',
        'DONE',
      ]);
      expect(await runAgain()).toEqual([
        'START',
        'PLAN_READY',
        'RESULT_CACHE_HIT',
        'DONE',
      ]);
    });

    it('walks the keyword path uncached', async () => {
      ctx.embeddings.failWith = new Error('down');

      const { stages } = await runGraph(false);

      expect(stages).toEqual([
        'START',
        'PLAN_READY',
        'EMBEDDING_ATTEMPTED',
        'KEYWORD_QUERY',
        'EXECUTED',
        'UNCACHED',
        'DONE',
      ]);
    });

    it('ends in FAILED after an engine error', async () => {
      ctx.engine.failWith = 'boom';

      const { stages } = await runGraph(true);

      expect(stages).toEqual([
        'START',
        'PLAN_READY',
        'EMBEDDING_ATTEMPTED',
        'HYBRID_QUERY',
        'EXECUTED',
        'FAILED',
      ]);
    });
  });
});

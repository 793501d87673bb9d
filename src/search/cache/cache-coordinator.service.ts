/**
 * Cache Coordinator Service
 * Typed access to the filter-plan, embedding and result namespaces over a
 * pluggable backend, with hit/miss counters and popular-query tracking.
 *
 * Caching never fails a request: every backend error is logged and turned
 * into a miss (reads) or a no-op (writes).
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isFilterPlan, type FilterPlan } from '../types/filter-plan.types';
import {
  isEmbeddingVector,
  isSearchResult,
  type EmbeddingVector,
  type SearchResult,
} from '../types/search.types';
import {
  CACHE_CONSTANTS,
  CACHE_NAMESPACES,
  type CacheLookup,
  type CacheNamespace,
  type CacheScope,
  type CacheValueMap,
  type NamespaceStats,
  type PopularQuery,
} from '../types/cache.types';
import { errorMessage } from '../errors/search.errors';
import { CACHE_BACKEND, type CacheBackend } from './cache-backend.interface';
import {
  embeddingKey,
  filterPlanKey,
  namespacePrefix,
  popularDisplayKey,
  popularKey,
  resultKey,
  statsKey,
} from './cache-key.util';

type Guard<T> = (value: unknown) => value is T;

type ValueGuards = {
  [N in CacheNamespace]: Guard<CacheValueMap[N]>;
};

const VALUE_GUARDS: ValueGuards = {
  filter_plan: isFilterPlan,
  embedding: isEmbeddingVector,
  result: isSearchResult,
};

const TTL_CONFIG_KEYS: Record<CacheNamespace, string> = {
  filter_plan: 'CACHE_FILTER_PLAN_TTL',
  embedding: 'CACHE_EMBEDDING_TTL',
  result: 'CACHE_RESULT_TTL',
};

@Injectable()
export class CacheCoordinatorService {
  private readonly logger = new Logger(CacheCoordinatorService.name);

  private readonly keyPrefix: string;
  private readonly ttls: Record<CacheNamespace, number>;
  private readonly popularTtl: number;
  private readonly statsTtl: number;

  constructor(
    @Inject(CACHE_BACKEND) private readonly backend: CacheBackend,
    private readonly configService: ConfigService,
  ) {
    this.keyPrefix = this.configService.get<string>(
      'CACHE_KEY_PREFIX',
      CACHE_CONSTANTS.DEFAULT_KEY_PREFIX,
    );

    this.ttls = {
      filter_plan: this.ttlFor('filter_plan'),
      embedding: this.ttlFor('embedding'),
      result: this.ttlFor('result'),
    };

    this.popularTtl = this.configService.get<number>(
      'CACHE_POPULAR_TTL',
      CACHE_CONSTANTS.POPULAR_TTL,
    );
    this.statsTtl = this.configService.get<number>(
      'CACHE_STATS_TTL',
      CACHE_CONSTANTS.STATS_TTL,
    );
  }

  get backendName(): string {
    return this.backend.name;
  }

  ttlSeconds(namespace: CacheNamespace): number {
    return this.ttls[namespace];
  }

  // ---------------------------------------------------------------------
  // Namespace helpers
  // ---------------------------------------------------------------------

  getFilterPlan(normalizedQuery: string): Promise<CacheLookup<FilterPlan>> {
    return this.get('filter_plan', filterPlanKey(this.keyPrefix, normalizedQuery));
  }

  setFilterPlan(normalizedQuery: string, plan: FilterPlan): Promise<void> {
    return this.set(
      'filter_plan',
      filterPlanKey(this.keyPrefix, normalizedQuery),
      plan,
    );
  }

  getEmbedding(normalizedQuery: string): Promise<CacheLookup<EmbeddingVector>> {
    return this.get('embedding', embeddingKey(this.keyPrefix, normalizedQuery));
  }

  setEmbedding(
    normalizedQuery: string,
    vector: EmbeddingVector,
  ): Promise<void> {
    return this.set(
      'embedding',
      embeddingKey(this.keyPrefix, normalizedQuery),
      vector,
    );
  }

  resultKey(normalizedQuery: string, page: number, plan: FilterPlan): string {
    return resultKey(this.keyPrefix, normalizedQuery, page, plan);
  }

  /**
   * A stored page holding fewer than `minSize` hits counts as a miss
   */
  getResult(
    normalizedQuery: string,
    page: number,
    plan: FilterPlan,
    minSize = 0,
  ): Promise<CacheLookup<SearchResult>> {
    return this.get(
      'result',
      this.resultKey(normalizedQuery, page, plan),
      (result) => result.size >= minSize,
    );
  }

  /**
   * Stores a result and bumps the query's popularity score
   */
  async setResult(
    normalizedQuery: string,
    page: number,
    plan: FilterPlan,
    result: SearchResult,
  ): Promise<void> {
    await this.set('result', this.resultKey(normalizedQuery, page, plan), result);
    await this.trackPopularQuery(normalizedQuery, result.query);
  }

  // ---------------------------------------------------------------------
  // Generic operations
  // ---------------------------------------------------------------------

  async get<N extends CacheNamespace>(
    namespace: N,
    key: string,
    accept?: (value: CacheValueMap[N]) => boolean,
  ): Promise<CacheLookup<CacheValueMap[N]>> {
    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (error) {
      this.logger.warn(
        `Cache get failed (namespace=${namespace}): ${errorMessage(error)}`,
      );
      return { hit: false };
    }

    const decoded = this.decode(namespace, raw);
    const lookup: CacheLookup<CacheValueMap[N]> =
      decoded.hit && accept && !accept(decoded.value) ? { hit: false } : decoded;
    await this.recordOutcome(namespace, lookup.hit ? 'hits' : 'misses');
    return lookup;
  }

  async set<N extends CacheNamespace>(
    namespace: N,
    key: string,
    value: CacheValueMap[N],
  ): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), this.ttls[namespace]);
    } catch (error) {
      this.logger.warn(
        `Cache set failed (namespace=${namespace}): ${errorMessage(error)}`,
      );
    }
  }

  /**
   * Removes every entry in the scope; returns how many keys were removed.
   * Counters and the popular-query set are only cleared with scope 'all'.
   */
  async clear(scope: CacheScope): Promise<number> {
    const prefix =
      scope === 'all'
        ? `${this.keyPrefix}:`
        : namespacePrefix(this.keyPrefix, scope);

    let removed = 0;
    try {
      removed = await this.backend.deleteByPrefix(prefix);
    } catch (error) {
      this.logger.warn(
        `Cache clear failed (scope=${scope}): ${errorMessage(error)}`,
      );
    }

    this.logger.log(`Cache cleared: scope=${scope} removed=${removed}`);
    return removed;
  }

  // ---------------------------------------------------------------------
  // Statistics
  // ---------------------------------------------------------------------

  async getNamespaceStats(
    namespace: CacheNamespace,
  ): Promise<NamespaceStats> {
    const hits = await this.readCounter(statsKey(this.keyPrefix, namespace, 'hits'));
    const misses = await this.readCounter(
      statsKey(this.keyPrefix, namespace, 'misses'),
    );
    const total = hits + misses;

    return {
      hits,
      misses,
      hitRate: total > 0 ? Math.round((hits / total) * 10000) / 100 : 0,
      ttlSeconds: this.ttls[namespace],
    };
  }

  async getAllNamespaceStats(): Promise<Record<CacheNamespace, NamespaceStats>> {
    const [filterPlan, embedding, result] = await Promise.all(
      CACHE_NAMESPACES.map((namespace) => this.getNamespaceStats(namespace)),
    );
    return { filter_plan: filterPlan, embedding, result };
  }

  async getPopularQueries(limit: number): Promise<PopularQuery[]> {
    try {
      const entries = await this.backend.sortedSetTop(
        popularKey(this.keyPrefix),
        limit,
      );
      return await Promise.all(
        entries.map(async ({ member, score }) => {
          const display = await this.backend.get(
            popularDisplayKey(this.keyPrefix, member),
          );
          return { query: display ?? member, count: score };
        }),
      );
    } catch (error) {
      this.logger.warn(`Popular query read failed: ${errorMessage(error)}`);
      return [];
    }
  }

  async countKeys(): Promise<number> {
    try {
      return await this.backend.countKeys(`${this.keyPrefix}:`);
    } catch (error) {
      this.logger.warn(`Cache key count failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  /**
   * Round-trip latency in milliseconds; rejects when the backend is down
   */
  async ping(): Promise<number> {
    const startTime = Date.now();
    await this.backend.ping();
    return Date.now() - startTime;
  }

  async purgeExpired(): Promise<number> {
    try {
      return await this.backend.purgeExpired();
    } catch (error) {
      this.logger.warn(`Expired entry purge failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private ttlFor(namespace: CacheNamespace): number {
    return this.configService.get<number>(
      TTL_CONFIG_KEYS[namespace],
      CACHE_CONSTANTS.DEFAULT_TTL[namespace],
    );
  }

  private decode<N extends CacheNamespace>(
    namespace: N,
    raw: string | null,
  ): CacheLookup<CacheValueMap[N]> {
    if (raw === null) {
      return { hit: false };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        `Undecodable cache entry (namespace=${namespace}): ${errorMessage(error)}`,
      );
      return { hit: false };
    }

    const guard: Guard<CacheValueMap[N]> = VALUE_GUARDS[namespace];
    if (!guard(parsed)) {
      this.logger.warn(`Malformed cache entry (namespace=${namespace})`);
      return { hit: false };
    }

    return { hit: true, value: parsed };
  }

  private async recordOutcome(
    namespace: CacheNamespace,
    outcome: 'hits' | 'misses',
  ): Promise<void> {
    try {
      await this.backend.increment(
        statsKey(this.keyPrefix, namespace, outcome),
        this.statsTtl,
      );
    } catch (error) {
      this.logger.warn(`Cache stats update failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Scores by normalized text; the latest original wording is kept as the
   * display form, which warming replays
   */
  private async trackPopularQuery(
    normalizedQuery: string,
    query: string,
  ): Promise<void> {
    const display = query.trim();
    if (!normalizedQuery || !display) {
      return;
    }

    try {
      await this.backend.sortedSetIncrement(
        popularKey(this.keyPrefix),
        normalizedQuery,
        1,
        this.popularTtl,
      );
      await this.backend.set(
        popularDisplayKey(this.keyPrefix, normalizedQuery),
        display,
        this.popularTtl,
      );
    } catch (error) {
      this.logger.warn(`Popular query update failed: ${errorMessage(error)}`);
    }
  }

  private async readCounter(key: string): Promise<number> {
    try {
      const raw = await this.backend.get(key);
      const value = raw === null ? 0 : Number.parseInt(raw, 10);
      return Number.isNaN(value) ? 0 : value;
    } catch (error) {
      this.logger.warn(`Cache counter read failed: ${errorMessage(error)}`);
      return 0;
    }
  }
}

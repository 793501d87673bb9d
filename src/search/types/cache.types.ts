/**
 * Cache Types & Constants
 * Three logical namespaces with independent TTLs, plus counters and the
 * popular-query sorted set.
 */

import type { FilterPlan } from './filter-plan.types';
import type { EmbeddingVector, SearchResult } from './search.types';

export const CACHE_NAMESPACES = ['filter_plan', 'embedding', 'result'] as const;

export type CacheNamespace = (typeof CACHE_NAMESPACES)[number];

export type CacheScope = CacheNamespace | 'all';

export interface CacheValueMap {
  filter_plan: FilterPlan;
  embedding: EmbeddingVector;
  result: SearchResult;
}

/**
 * Outcome of a cache read. Backend errors and undecodable payloads are
 * reported as misses.
 */
export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

export const CACHE_CONSTANTS = {
  /**
   * Key segment per namespace
   */
  NAMESPACE_PREFIX: {
    filter_plan: 'filter',
    embedding: 'embed',
    result: 'query',
  },

  STATS_PREFIX: 'stats',

  POPULAR_KEY: 'popular:queries',

  /**
   * Default TTLs in seconds
   */
  DEFAULT_TTL: {
    filter_plan: 600,
    embedding: 3600,
    result: 300,
  },

  POPULAR_TTL: 1800,

  STATS_TTL: 86400,

  DEFAULT_KEY_PREFIX: 'property-search',

  DEFAULT_MEMORY_MAX_ENTRIES: 10000,
} as const;

export interface NamespaceStats {
  hits: number;
  misses: number;
  /** Percentage, two decimals */
  hitRate: number;
  ttlSeconds: number;
}

export interface PopularQuery {
  query: string;
  count: number;
}

export interface CacheStats {
  backend: string;
  totalKeys: number;
  namespaces: Record<CacheNamespace, NamespaceStats>;
  popularQueries: PopularQuery[];
}

export interface CacheHealth {
  status: 'healthy' | 'unhealthy';
  backend: string;
  connected: boolean;
  latencyMs?: number;
  error?: string;
}

/**
 * Search Service Types
 */

import { isFilterPlan, type FilterPlan } from './filter-plan.types';

export type EmbeddingVector = readonly number[];

export type SearchMethod = 'hybrid_semantic' | 'keyword_only';

/**
 * Which pipeline stage produced the response
 */
export type ServedFrom = 'result_cache' | 'search_engine';

/**
 * Record payload plus an opaque relevance score. Scores are only
 * comparable within one result set.
 */
export interface ScoredRecord {
  id: string;
  score: number;
  record: Record<string, unknown>;
}

export interface PerformanceBreakdown {
  parseTimeMs: number;
  embeddingTimeMs: number;
  engineTimeMs: number;
  totalTimeMs: number;
  method: SearchMethod;
  servedFrom: ServedFrom;
  planFromCache: boolean;
  embeddingFromCache: boolean;
}

export interface SearchResult {
  query: string;
  page: number;
  size: number;
  hits: ScoredRecord[];
  totalMatches: number;
  filterPlan: FilterPlan;
  servedFrom: ServedFrom;
  performance: PerformanceBreakdown;
}

export function isEmbeddingVector(value: unknown): value is EmbeddingVector {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isScoredRecord(value: unknown): value is ScoredRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'score' in value &&
    typeof value.score === 'number' &&
    'record' in value &&
    typeof value.record === 'object' &&
    value.record !== null
  );
}

function isSearchMethod(value: unknown): value is SearchMethod {
  return value === 'hybrid_semantic' || value === 'keyword_only';
}

function isPerformanceBreakdown(value: unknown): value is PerformanceBreakdown {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'parseTimeMs' in value &&
    typeof value.parseTimeMs === 'number' &&
    'embeddingTimeMs' in value &&
    typeof value.embeddingTimeMs === 'number' &&
    'engineTimeMs' in value &&
    typeof value.engineTimeMs === 'number' &&
    'totalTimeMs' in value &&
    typeof value.totalTimeMs === 'number' &&
    'method' in value &&
    isSearchMethod(value.method) &&
    'servedFrom' in value &&
    (value.servedFrom === 'result_cache' ||
      value.servedFrom === 'search_engine') &&
    'planFromCache' in value &&
    typeof value.planFromCache === 'boolean' &&
    'embeddingFromCache' in value &&
    typeof value.embeddingFromCache === 'boolean'
  );
}

/**
 * Type guard for search results read back from the cache
 */
export function isSearchResult(value: unknown): value is SearchResult {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'query' in value &&
    typeof value.query === 'string' &&
    'page' in value &&
    typeof value.page === 'number' &&
    'size' in value &&
    typeof value.size === 'number' &&
    'hits' in value &&
    Array.isArray(value.hits) &&
    value.hits.every(isScoredRecord) &&
    'totalMatches' in value &&
    typeof value.totalMatches === 'number' &&
    'filterPlan' in value &&
    isFilterPlan(value.filterPlan) &&
    'servedFrom' in value &&
    (value.servedFrom === 'result_cache' ||
      value.servedFrom === 'search_engine') &&
    'performance' in value &&
    isPerformanceBreakdown(value.performance)
  );
}

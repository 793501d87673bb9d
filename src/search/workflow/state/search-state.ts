/**
 * Search Workflow State Definition
 * Following LangGraph.js Annotation.Root pattern
 *
 * Stage path per request:
 *   START → PLAN_READY → EMBEDDING_ATTEMPTED → HYBRID_QUERY | KEYWORD_QUERY
 *         → EXECUTED → CACHED | UNCACHED → DONE
 * with the early exit START → PLAN_READY → RESULT_CACHE_HIT → DONE and the
 * terminal FAILED after an engine error.
 */

import { Annotation } from '@langchain/langgraph';
import type { FilterPlan } from '../../types/filter-plan.types';
import type {
  EmbeddingVector,
  SearchMethod,
  SearchResult,
} from '../../types/search.types';
import type { EmbeddingFailureReason } from '../../services/embedding-gateway.service';
import type {
  EngineQuery,
  EngineResponse,
} from '../../engine/search-engine.interface';

export type SearchStage =
  | 'START'
  | 'PLAN_READY'
  | 'RESULT_CACHE_HIT'
  | 'EMBEDDING_ATTEMPTED'
  | 'HYBRID_QUERY'
  | 'KEYWORD_QUERY'
  | 'EXECUTED'
  | 'CACHED'
  | 'UNCACHED'
  | 'DONE'
  | 'FAILED';

export interface StageTimings {
  parseTimeMs: number;
  embeddingTimeMs: number;
  engineTimeMs: number;
}

/**
 * Search Request Input
 */
export interface SearchRequest {
  query: string;
  page: number;
  size: number;
  useCache: boolean;
}

export const SearchState = Annotation.Root({
  // ============================================
  // Input
  // ============================================
  query: Annotation<string>,
  normalizedQuery: Annotation<string>,
  page: Annotation<number>,
  size: Annotation<number>,
  useCache: Annotation<boolean>,
  startedAt: Annotation<number>,

  // ============================================
  // Plan & result cache
  // ============================================
  filterPlan: Annotation<FilterPlan | null>,
  planFromCache: Annotation<boolean>,
  cachedResult: Annotation<SearchResult | null>,

  // ============================================
  // Embedding
  // ============================================
  embedding: Annotation<EmbeddingVector | null>,
  embeddingFromCache: Annotation<boolean>,
  embeddingFailure: Annotation<EmbeddingFailureReason | null>,

  // ============================================
  // Engine
  // ============================================
  engineQuery: Annotation<EngineQuery | null>,
  method: Annotation<SearchMethod | null>,
  engineResponse: Annotation<EngineResponse | null>,
  engineError: Annotation<string | null>,

  // ============================================
  // Output
  // ============================================
  result: Annotation<SearchResult | null>,

  // ============================================
  // Workflow metadata
  // ============================================
  currentStage: Annotation<SearchStage>,
  stageHistory: Annotation<SearchStage[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
  timings: Annotation<StageTimings, Partial<StageTimings>>({
    reducer: (current, update) => ({ ...current, ...update }),
    default: () => ({ parseTimeMs: 0, embeddingTimeMs: 0, engineTimeMs: 0 }),
  }),
});

export type SearchStateType = typeof SearchState.State;

export type SearchStateUpdate = typeof SearchState.Update;

/**
 * Marks a stage transition
 */
export function enterStage(stage: SearchStage): {
  currentStage: SearchStage;
  stageHistory: SearchStage[];
} {
  return { currentStage: stage, stageHistory: [stage] };
}

export function createInitialState(
  request: SearchRequest,
  normalizedQuery: string,
): SearchStateUpdate {
  return {
    query: request.query,
    normalizedQuery,
    page: request.page,
    size: request.size,
    useCache: request.useCache,
    startedAt: Date.now(),

    filterPlan: null,
    planFromCache: false,
    cachedResult: null,

    embedding: null,
    embeddingFromCache: false,
    embeddingFailure: null,

    engineQuery: null,
    method: null,
    engineResponse: null,
    engineError: null,

    result: null,

    ...enterStage('START'),
  };
}

/**
 * Builds the engine-served result from the state reached after execution
 */
export function assembleEngineResult(
  state: SearchStateType,
  now: number,
): SearchResult | null {
  if (!state.engineResponse || !state.filterPlan || !state.method) {
    return null;
  }

  return {
    query: state.query,
    page: state.page,
    size: state.size,
    hits: state.engineResponse.hits,
    totalMatches: state.engineResponse.totalMatches,
    filterPlan: state.filterPlan,
    servedFrom: 'search_engine',
    performance: {
      ...state.timings,
      totalTimeMs: now - state.startedAt,
      method: state.method,
      servedFrom: 'search_engine',
      planFromCache: state.planFromCache,
      embeddingFromCache: state.embeddingFromCache,
    },
  };
}

/**
 * Re-tags a cached result with fresh timings
 */
export function assembleCachedResult(
  state: SearchStateType,
  now: number,
): SearchResult | null {
  const cached = state.cachedResult;
  if (!cached) {
    return null;
  }

  return {
    ...cached,
    query: state.query,
    size: state.size,
    hits: cached.hits.slice(0, state.size),
    servedFrom: 'result_cache',
    performance: {
      parseTimeMs: state.timings.parseTimeMs,
      embeddingTimeMs: 0,
      engineTimeMs: 0,
      totalTimeMs: now - state.startedAt,
      method: cached.performance.method,
      servedFrom: 'result_cache',
      planFromCache: state.planFromCache,
      embeddingFromCache: false,
    },
  };
}

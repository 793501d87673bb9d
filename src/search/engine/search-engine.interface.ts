/**
 * Search Engine contract
 * Structured bool query with an optional vector clause in, ranked hits out.
 * Implementations throw SearchEngineError on any execution failure.
 */

import type { Condition, SortClause } from '../types/filter-plan.types';
import type { EmbeddingVector, ScoredRecord } from '../types/search.types';

export const SEARCH_ENGINE = Symbol('SEARCH_ENGINE');

export type QueryClause =
  | { kind: 'match_all' }
  | {
      kind: 'bool';
      must: readonly Condition[];
      filter: readonly Condition[];
      should: readonly Condition[];
    };

/**
 * Approximate nearest-neighbour clause over the top `k` candidates
 */
export interface VectorClause {
  field: string;
  vector: EmbeddingVector;
  k: number;
}

export interface EngineQuery {
  clause: QueryClause;
  vector: VectorClause | null;
  /** Overrides similarity ordering when present */
  sort: readonly SortClause[] | null;
  offset: number;
  limit: number;
  timeoutMs: number;
}

export interface EngineResponse {
  hits: ScoredRecord[];
  totalMatches: number;
}

export interface SearchEngine {
  search(query: EngineQuery): Promise<EngineResponse>;

  healthCheck(): Promise<boolean>;
}

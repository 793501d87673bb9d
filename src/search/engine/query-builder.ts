/**
 * Engine query construction from a filter plan
 */

import { isEmptyPlan, type FilterPlan } from '../types/filter-plan.types';
import type { EmbeddingVector } from '../types/search.types';
import type { EngineQuery, QueryClause } from './search-engine.interface';

export interface PageOptions {
  page: number;
  size: number;
  timeoutMs: number;
}

export interface VectorOptions {
  field: string;
  k: number;
}

function planClause(plan: FilterPlan): QueryClause {
  if (isEmptyPlan(plan)) {
    return { kind: 'match_all' };
  }

  return {
    kind: 'bool',
    must: plan.must,
    filter: plan.filter,
    should: [],
  };
}

function pagination({ page, size }: PageOptions) {
  return { offset: (page - 1) * size, limit: size };
}

/**
 * Pure filter query; an empty plan matches everything
 */
export function buildKeywordQuery(
  plan: FilterPlan,
  options: PageOptions,
): EngineQuery {
  return {
    clause: planClause(plan),
    vector: null,
    sort: plan.sort,
    ...pagination(options),
    timeoutMs: options.timeoutMs,
  };
}

/**
 * Vector similarity over the top-k candidates, gated by the plan's must and
 * filter conditions. An explicit sort replaces similarity ordering.
 */
export function buildHybridQuery(
  plan: FilterPlan,
  vector: EmbeddingVector,
  vectorOptions: VectorOptions,
  options: PageOptions,
): EngineQuery {
  return {
    clause: planClause(plan),
    vector: { field: vectorOptions.field, vector, k: vectorOptions.k },
    sort: plan.sort,
    ...pagination(options),
    timeoutMs: options.timeoutMs,
  };
}

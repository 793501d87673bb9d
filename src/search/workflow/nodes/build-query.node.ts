/**
 * Build Query Nodes
 * Hybrid (vector + plan) and keyword-only (plan only) engine queries
 */

import { Logger } from '@nestjs/common';
import {
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import {
  buildHybridQuery,
  buildKeywordQuery,
} from '../../engine/query-builder';

export interface HybridQueryOptions {
  vectorField: string;
  candidates: number;
  timeoutMs: number;
}

export interface KeywordQueryOptions {
  timeoutMs: number;
}

export function createBuildHybridQueryNode(options: HybridQueryOptions) {
  const logger = new Logger('BuildHybridQueryNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    if (!state.filterPlan || !state.embedding) {
      throw new Error('Hybrid query requires a filter plan and an embedding');
    }

    const engineQuery = buildHybridQuery(
      state.filterPlan,
      state.embedding,
      { field: options.vectorField, k: options.candidates },
      { page: state.page, size: state.size, timeoutMs: options.timeoutMs },
    );

    logger.debug(
      `[BuildHybridQuery] stage=query substage=hybrid status=built k=${options.candidates} sorted=${engineQuery.sort !== null}`,
    );

    return {
      engineQuery,
      method: 'hybrid_semantic',
      ...enterStage('HYBRID_QUERY'),
    };
  };
}

export function createBuildKeywordQueryNode(options: KeywordQueryOptions) {
  const logger = new Logger('BuildKeywordQueryNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    if (!state.filterPlan) {
      throw new Error('Keyword query requires a filter plan');
    }

    const engineQuery = buildKeywordQuery(state.filterPlan, {
      page: state.page,
      size: state.size,
      timeoutMs: options.timeoutMs,
    });

    logger.debug(
      `[BuildKeywordQuery] stage=query substage=keyword status=built clause=${engineQuery.clause.kind}`,
    );

    return {
      engineQuery,
      method: 'keyword_only',
      ...enterStage('KEYWORD_QUERY'),
    };
  };
}

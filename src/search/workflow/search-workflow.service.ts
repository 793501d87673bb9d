/**
 * Search Workflow Service
 * LangGraph.js StateGraph for the hybrid search pipeline:
 * plan → result cache → embedding → hybrid | keyword query → execute →
 * cache population, with the early exit on a result-cache hit.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  SearchState,
  createInitialState,
  type SearchStateType,
} from './state/search-state';
import { createResolvePlanNode } from './nodes/resolve-plan.node';
import { createCheckResultCacheNode } from './nodes/check-result-cache.node';
import { createResolveEmbeddingNode } from './nodes/resolve-embedding.node';
import {
  createBuildHybridQueryNode,
  createBuildKeywordQueryNode,
  type HybridQueryOptions,
  type KeywordQueryOptions,
} from './nodes/build-query.node';
import { createExecuteSearchNode } from './nodes/execute-search.node';
import { createUpdateCacheNode } from './nodes/update-cache.node';
import { createCompleteNode, createFailNode } from './nodes/complete.node';
import {
  FilterParserService,
  normalizeQuery,
} from '../parser/filter-parser.service';
import { CacheCoordinatorService } from '../cache/cache-coordinator.service';
import { EmbeddingGatewayService } from '../services/embedding-gateway.service';
import {
  SEARCH_ENGINE,
  type SearchEngine,
} from '../engine/search-engine.interface';
import { SearchEngineError } from '../errors/search.errors';
import type { SearchResult } from '../types/search.types';

export interface SearchGraphDependencies {
  parser: FilterParserService;
  cache: CacheCoordinatorService;
  embeddingGateway: EmbeddingGatewayService;
  engine: SearchEngine;
  hybrid: HybridQueryOptions;
  keyword: KeywordQueryOptions;
}

export function compileSearchGraph(deps: SearchGraphDependencies) {
  return (
    new StateGraph(SearchState)
      .addNode('resolvePlan', createResolvePlanNode(deps.parser, deps.cache))
      .addNode('checkResultCache', createCheckResultCacheNode(deps.cache))
      .addNode(
        'resolveEmbedding',
        createResolveEmbeddingNode(deps.embeddingGateway),
      )
      .addNode('buildHybridQuery', createBuildHybridQueryNode(deps.hybrid))
      .addNode('buildKeywordQuery', createBuildKeywordQueryNode(deps.keyword))
      .addNode('executeSearch', createExecuteSearchNode(deps.engine))
      .addNode('updateCache', createUpdateCacheNode(deps.cache))
      .addNode('complete', createCompleteNode())
      .addNode('fail', createFailNode())
      .addEdge(START, 'resolvePlan')
      .addEdge('resolvePlan', 'checkResultCache')
      // Cache HIT: skip embedding and engine
      .addConditionalEdges(
        'checkResultCache',
        (state: SearchStateType) => (state.cachedResult ? 'hit' : 'miss'),
        {
          hit: 'complete',
          miss: 'resolveEmbedding',
        },
      )
      // No embedding: keyword-only fallback
      .addConditionalEdges(
        'resolveEmbedding',
        (state: SearchStateType) => (state.embedding ? 'hybrid' : 'keyword'),
        {
          hybrid: 'buildHybridQuery',
          keyword: 'buildKeywordQuery',
        },
      )
      .addEdge('buildHybridQuery', 'executeSearch')
      .addEdge('buildKeywordQuery', 'executeSearch')
      .addConditionalEdges(
        'executeSearch',
        (state: SearchStateType) =>
          state.engineError !== null ? 'failed' : 'succeeded',
        {
          failed: 'fail',
          succeeded: 'updateCache',
        },
      )
      .addEdge('updateCache', 'complete')
      .addEdge('complete', END)
      .addEdge('fail', END)
      .compile()
  );
}

type CompiledSearchGraph = ReturnType<typeof compileSearchGraph>;

@Injectable()
export class SearchWorkflowService {
  private readonly logger = new Logger(SearchWorkflowService.name);
  private readonly workflow: CompiledSearchGraph;
  private readonly defaultSize: number;
  private readonly maxSize: number;

  constructor(
    private readonly configService: ConfigService,
    parser: FilterParserService,
    cache: CacheCoordinatorService,
    embeddingGateway: EmbeddingGatewayService,
    @Inject(SEARCH_ENGINE) engine: SearchEngine,
  ) {
    this.defaultSize = this.configService.get<number>('SEARCH_DEFAULT_SIZE', 20);
    this.maxSize = this.configService.get<number>('SEARCH_MAX_SIZE', 100);

    this.workflow = compileSearchGraph({
      parser,
      cache,
      embeddingGateway,
      engine,
      hybrid: {
        vectorField: this.configService.get<string>(
          'SEARCH_VECTOR_FIELD',
          'description_vector',
        ),
        candidates: this.configService.get<number>('SEARCH_KNN_CANDIDATES', 100),
        timeoutMs: this.configService.get<number>(
          'SEARCH_HYBRID_TIMEOUT_MS',
          1000,
        ),
      },
      keyword: {
        timeoutMs: this.configService.get<number>(
          'SEARCH_KEYWORD_TIMEOUT_MS',
          2000,
        ),
      },
    });

    this.logger.log('✓ LangGraph search workflow initialized');
  }

  /**
   * Execute the search workflow
   *
   * @throws SearchEngineError when the engine call fails; cache and
   * embedding problems never surface here
   */
  async search(
    query: string,
    page = 1,
    size?: number,
    useCache = true,
  ): Promise<SearchResult> {
    const request = {
      query,
      page: Math.max(1, Math.trunc(page)),
      size: Math.min(
        this.maxSize,
        Math.max(1, Math.trunc(size ?? this.defaultSize)),
      ),
      useCache,
    };

    this.logger.log(
      `Starting search workflow: "${query}" (page: ${request.page}, size: ${request.size}, useCache: ${useCache})`,
    );

    const finalState = await this.workflow.invoke(
      createInitialState(request, normalizeQuery(query)),
    );
    const path = finalState.stageHistory.join('>');

    if (finalState.currentStage === 'FAILED') {
      this.logger.error(`Search workflow failed: path=${path}`);
      throw new SearchEngineError(
        finalState.engineError ?? 'Search engine failure',
      );
    }

    if (!finalState.result) {
      throw new Error(`Search workflow ended without a result: path=${path}`);
    }

    this.logger.log(
      `Search workflow completed: path=${path} method=${finalState.result.performance.method} servedFrom=${finalState.result.servedFrom} hits=${finalState.result.hits.length} duration=${finalState.result.performance.totalTimeMs}ms`,
    );

    return finalState.result;
  }
}

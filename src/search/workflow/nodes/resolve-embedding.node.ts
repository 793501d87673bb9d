/**
 * Resolve Embedding Node
 * Embedding via the gateway; a failure is recorded, never thrown, and
 * routes the request to the keyword-only branch
 */

import { Logger } from '@nestjs/common';
import {
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import type { EmbeddingGatewayService } from '../../services/embedding-gateway.service';

export function createResolveEmbeddingNode(gateway: EmbeddingGatewayService) {
  const logger = new Logger('ResolveEmbeddingNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    const startTime = Date.now();
    const outcome = await gateway.embedQuery(state.query);
    const duration = Date.now() - startTime;

    if (!outcome.ok) {
      logger.warn(
        `[ResolveEmbedding] stage=embedding substage=resolve status=unavailable reason=${outcome.reason} duration=${duration}ms`,
      );
      return {
        embedding: null,
        embeddingFromCache: false,
        embeddingFailure: outcome.reason,
        timings: { embeddingTimeMs: duration },
        ...enterStage('EMBEDDING_ATTEMPTED'),
      };
    }

    logger.debug(
      `[ResolveEmbedding] stage=embedding substage=resolve status=ready fromCache=${outcome.fromCache} duration=${duration}ms`,
    );
    return {
      embedding: outcome.vector,
      embeddingFromCache: outcome.fromCache,
      embeddingFailure: null,
      timings: { embeddingTimeMs: duration },
      ...enterStage('EMBEDDING_ATTEMPTED'),
    };
  };
}

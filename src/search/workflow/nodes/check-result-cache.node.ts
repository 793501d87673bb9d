/**
 * Check Result Cache Node
 * Full-result lookup keyed by normalized text, page and plan
 *
 * Flow:
 * - useCache=false → skip (continue to embedding)
 * - hit with a stored page at least as large as requested → RESULT_CACHE_HIT
 * - otherwise → continue to embedding
 */

import { Logger } from '@nestjs/common';
import {
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import type { CacheCoordinatorService } from '../../cache/cache-coordinator.service';

export function createCheckResultCacheNode(cache: CacheCoordinatorService) {
  const logger = new Logger('CheckResultCacheNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    if (!state.useCache || !state.filterPlan) {
      logger.debug(
        `[CheckResultCache] stage=result_cache substage=skip status=disabled`,
      );
      return { cachedResult: null };
    }

    const startTime = Date.now();
    const lookup = await cache.getResult(
      state.normalizedQuery,
      state.page,
      state.filterPlan,
      state.size,
    );
    const duration = Date.now() - startTime;

    if (lookup.hit) {
      logger.log(
        `[CheckResultCache] stage=result_cache substage=lookup status=hit duration=${duration}ms hits=${lookup.value.hits.length}`,
      );
      return {
        cachedResult: lookup.value,
        ...enterStage('RESULT_CACHE_HIT'),
      };
    }

    logger.debug(
      `[CheckResultCache] stage=result_cache substage=lookup status=miss duration=${duration}ms`,
    );
    return { cachedResult: null };
  };
}

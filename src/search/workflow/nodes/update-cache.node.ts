/**
 * Update Cache Node
 * Stores first-page results in the result cache
 */

import { Logger } from '@nestjs/common';
import {
  assembleEngineResult,
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import type { CacheCoordinatorService } from '../../cache/cache-coordinator.service';

export function createUpdateCacheNode(cache: CacheCoordinatorService) {
  const logger = new Logger('UpdateCacheNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    const result = assembleEngineResult(state, Date.now());

    if (!result || !state.filterPlan || !state.useCache || state.page !== 1) {
      logger.debug(
        `[UpdateCache] stage=update_cache substage=skip status=${state.useCache ? 'not_first_page' : 'cache_disabled'}`,
      );
      return { result, ...enterStage('UNCACHED') };
    }

    const startTime = Date.now();
    await cache.setResult(
      state.normalizedQuery,
      state.page,
      state.filterPlan,
      result,
    );

    logger.debug(
      `[UpdateCache] stage=update_cache substage=store status=completed duration=${Date.now() - startTime}ms`,
    );
    return { result, ...enterStage('CACHED') };
  };
}

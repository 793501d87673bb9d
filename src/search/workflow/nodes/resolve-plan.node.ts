/**
 * Resolve Plan Node
 * Filter plan via the plan cache, or the parser on a miss
 */

import { Logger } from '@nestjs/common';
import {
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import type { FilterParserService } from '../../parser/filter-parser.service';
import type { CacheCoordinatorService } from '../../cache/cache-coordinator.service';

export function createResolvePlanNode(
  parser: FilterParserService,
  cache: CacheCoordinatorService,
) {
  const logger = new Logger('ResolvePlanNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    const startTime = Date.now();

    const cached = await cache.getFilterPlan(state.normalizedQuery);
    if (cached.hit) {
      const duration = Date.now() - startTime;
      logger.debug(
        `[ResolvePlan] stage=plan substage=cache status=hit duration=${duration}ms`,
      );
      return {
        filterPlan: cached.value,
        planFromCache: true,
        timings: { parseTimeMs: duration },
        ...enterStage('PLAN_READY'),
      };
    }

    // state code detection needs the original casing
    const plan = parser.parse(state.query);
    await cache.setFilterPlan(state.normalizedQuery, plan);

    const duration = Date.now() - startTime;
    logger.debug(
      `[ResolvePlan] stage=plan substage=parse status=completed duration=${duration}ms must=${plan.must.length} filter=${plan.filter.length} sort=${plan.sort ? plan.sort.length : 0}`,
    );

    return {
      filterPlan: plan,
      planFromCache: false,
      timings: { parseTimeMs: duration },
      ...enterStage('PLAN_READY'),
    };
  };
}

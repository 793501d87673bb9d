/**
 * Terminal Nodes
 * DONE for both the cache-hit exit and the engine path, FAILED after an
 * engine error
 */

import {
  assembleCachedResult,
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';

export function createCompleteNode() {
  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    if (state.currentStage === 'RESULT_CACHE_HIT') {
      return {
        result: assembleCachedResult(state, Date.now()),
        ...enterStage('DONE'),
      };
    }

    return enterStage('DONE');
  };
}

export function createFailNode() {
  return async (): Promise<SearchStateUpdate> => ({
    result: null,
    ...enterStage('FAILED'),
  });
}

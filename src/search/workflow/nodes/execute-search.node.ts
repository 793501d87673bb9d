/**
 * Execute Search Node
 * Runs the engine query once; failures end the workflow in FAILED and are
 * not retried or masked by a further fallback
 */

import { Logger } from '@nestjs/common';
import {
  enterStage,
  type SearchStateType,
  type SearchStateUpdate,
} from '../state/search-state';
import type { SearchEngine } from '../../engine/search-engine.interface';
import { errorMessage } from '../../errors/search.errors';

export function createExecuteSearchNode(engine: SearchEngine) {
  const logger = new Logger('ExecuteSearchNode');

  return async (state: SearchStateType): Promise<SearchStateUpdate> => {
    if (!state.engineQuery) {
      throw new Error('No engine query to execute');
    }

    const startTime = Date.now();

    try {
      const engineResponse = await engine.search(state.engineQuery);
      const duration = Date.now() - startTime;

      logger.log(
        `[ExecuteSearch] stage=execute substage=${state.method ?? 'unknown'} status=completed duration=${duration}ms hits=${engineResponse.hits.length} total=${engineResponse.totalMatches}`,
      );

      return {
        engineResponse,
        engineError: null,
        timings: { engineTimeMs: duration },
        ...enterStage('EXECUTED'),
      };
    } catch (error) {
      const duration = Date.now() - startTime;
      const message = errorMessage(error);

      logger.error(
        `[ExecuteSearch] stage=execute substage=${state.method ?? 'unknown'} status=failed duration=${duration}ms error=${message}`,
      );

      return {
        engineResponse: null,
        engineError: message,
        timings: { engineTimeMs: duration },
        ...enterStage('EXECUTED'),
      };
    }
  };
}

import { SearchEngineError } from '../../src/search/errors/search.errors';
import type {
  EngineQuery,
  EngineResponse,
  SearchEngine,
} from '../../src/search/engine/search-engine.interface';
import type { ScoredRecord } from '../../src/search/types/search.types';

/**
 * In-process search engine that records every query and pages through a
 * fixed record list
 */
export class FakeSearchEngine implements SearchEngine {
  readonly queries: EngineQuery[] = [];

  failWith: string | null = null;
  healthy = true;

  constructor(private readonly records: ScoredRecord[] = []) {}

  async search(query: EngineQuery): Promise<EngineResponse> {
    this.queries.push(query);

    if (this.failWith) {
      throw new SearchEngineError(this.failWith);
    }

    const total = query.vector
      ? Math.min(this.records.length, query.vector.k)
      : this.records.length;

    return {
      hits: this.records.slice(query.offset, query.offset + query.limit),
      totalMatches: total,
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export function makeRecords(count: number): ScoredRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `rec-${i + 1}`,
    score: 1 - i / 100,
    record: { propertyAddress: { city: 'AUSTIN', state: 'TX' }, rank: i + 1 },
  }));
}

/**
 * Qdrant Search Engine
 * Translates engine queries into Qdrant Query API requests.
 *
 * Vector requests prefetch the top-k candidates under the filter, then
 * either re-score them by the same vector or order them by the explicit
 * sort. Totals come from an exact count over the filter, capped at k when a
 * vector clause is present.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import type {
  BoundKind,
  Condition,
  SortClause,
  SortOrder,
  TermValue,
} from '../types/filter-plan.types';
import type { ScoredRecord } from '../types/search.types';
import { SearchEngineError, errorMessage } from '../errors/search.errors';
import { withTimeout } from '../../common/utils/with-timeout';
import type {
  EngineQuery,
  EngineResponse,
  QueryClause,
  SearchEngine,
} from './search-engine.interface';

/**
 * Qdrant Filter Structure (the subset this service emits)
 */
export type QdrantCondition =
  | { key: string; match: { value: TermValue } }
  | { key: string; range: { gte?: number; lte?: number } }
  | { nested: { key: string; filter: QdrantFilter } };

export interface QdrantFilter {
  must?: QdrantCondition[];
  should?: QdrantCondition[];
}

export interface QdrantOrderBy {
  key: string;
  direction: SortOrder;
}

export interface QdrantQueryRequest {
  prefetch?: {
    query: number[];
    using: string;
    filter?: QdrantFilter;
    limit: number;
  };
  query?: number[] | { order_by: QdrantOrderBy };
  using?: string;
  filter?: QdrantFilter;
  offset: number;
  limit: number;
  with_payload: true;
  /** Server-side timeout in seconds */
  timeout: number;
}

function toRange(bound: BoundKind, value: number): { gte?: number; lte?: number } {
  return bound === 'gte' ? { gte: value } : { lte: value };
}

export function toQdrantCondition(condition: Condition): QdrantCondition {
  switch (condition.kind) {
    case 'term':
      return { key: condition.field, match: { value: condition.value } };
    case 'range':
      return {
        key: condition.field,
        range: toRange(condition.bound, condition.value),
      };
    case 'nested_range':
      return {
        nested: {
          key: condition.path,
          filter: {
            must: [
              {
                key: condition.field,
                range: toRange(condition.bound, condition.value),
              },
            ],
          },
        },
      };
    default: {
      const unreachable: never = condition;
      throw new Error(`Unknown condition: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * must and filter both gate the candidate set; match_all has no filter
 */
export function toQdrantFilter(clause: QueryClause): QdrantFilter | undefined {
  switch (clause.kind) {
    case 'match_all':
      return undefined;
    case 'bool': {
      const must = [...clause.must, ...clause.filter].map(toQdrantCondition);
      const should = clause.should.map(toQdrantCondition);
      if (must.length === 0 && should.length === 0) {
        return undefined;
      }
      return {
        ...(must.length > 0 ? { must } : {}),
        ...(should.length > 0 ? { should } : {}),
      };
    }
    default: {
      const unreachable: never = clause;
      throw new Error(`Unknown clause: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function toQdrantOrderBy(sort: SortClause): QdrantOrderBy {
  return {
    key: sort.nestedPath ? `${sort.nestedPath}[].${sort.field}` : sort.field,
    direction: sort.order,
  };
}

export function buildQdrantRequest(query: EngineQuery): QdrantQueryRequest {
  const filter = toQdrantFilter(query.clause);
  const sort = query.sort?.[0];
  const orderBy = sort ? { order_by: toQdrantOrderBy(sort) } : undefined;
  const base = {
    ...(filter ? { filter } : {}),
    offset: query.offset,
    limit: query.limit,
    with_payload: true as const,
    timeout: Math.max(1, Math.ceil(query.timeoutMs / 1000)),
  };

  if (!query.vector) {
    return orderBy ? { ...base, query: orderBy } : base;
  }

  const vector = [...query.vector.vector];
  return {
    ...base,
    prefetch: {
      query: vector,
      using: query.vector.field,
      ...(filter ? { filter } : {}),
      limit: query.vector.k,
    },
    ...(orderBy ? { query: orderBy } : { query: vector, using: query.vector.field }),
  };
}

@Injectable()
export class QdrantSearchEngine implements SearchEngine {
  private readonly logger = new Logger(QdrantSearchEngine.name);
  private readonly client: QdrantClient;
  private readonly collection: string;

  constructor(private readonly configService: ConfigService) {
    const url = this.configService.get<string>(
      'QDRANT_URL',
      'http://localhost:6333',
    );
    const apiKey = this.configService.get<string>('QDRANT_API_KEY');

    this.client = new QdrantClient({ url, ...(apiKey ? { apiKey } : {}) });
    this.collection = this.configService.get<string>(
      'SEARCH_COLLECTION',
      'property_records',
    );

    this.logger.log(
      `QdrantClient initialized: ${url} collection=${this.collection}`,
    );
  }

  async search(query: EngineQuery): Promise<EngineResponse> {
    const request = buildQdrantRequest(query);
    const filter = request.filter;

    try {
      const [result, count] = await withTimeout(
        Promise.all([
          this.client.query(this.collection, request),
          this.client.count(this.collection, {
            ...(filter ? { filter } : {}),
            exact: true,
          }),
        ]),
        query.timeoutMs,
        'Search request',
      );

      const hits: ScoredRecord[] = result.points.map((point) => ({
        id: String(point.id),
        score: point.score,
        record: point.payload ?? {},
      }));

      return {
        hits,
        totalMatches: query.vector
          ? Math.min(count.count, query.vector.k)
          : count.count,
      };
    } catch (error) {
      throw new SearchEngineError(`Qdrant query failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Health check for Qdrant service
   * @returns true if service is available, false otherwise
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

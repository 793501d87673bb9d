/**
 * Cache Stats Service
 * Hit/miss statistics, popular queries and backend health for the admin
 * and health endpoints
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CacheCoordinatorService } from '../cache/cache-coordinator.service';
import {
  SEARCH_ENGINE,
  type SearchEngine,
} from '../engine/search-engine.interface';
import type {
  CacheHealth,
  CacheScope,
  CacheStats,
} from '../types/cache.types';
import { errorMessage } from '../errors/search.errors';

const POPULAR_QUERY_LIMIT = 10;

export interface ServiceHealth {
  /** degraded = search works but the cache backend is unreachable */
  status: 'healthy' | 'degraded' | 'unhealthy';
  cache: CacheHealth;
  searchEngine: { connected: boolean };
  timestamp: string;
}

@Injectable()
export class CacheStatsService {
  private readonly logger = new Logger(CacheStatsService.name);

  constructor(
    private readonly cache: CacheCoordinatorService,
    @Inject(SEARCH_ENGINE) private readonly engine: SearchEngine,
  ) {}

  async getCacheStats(): Promise<CacheStats> {
    const [namespaces, totalKeys, popularQueries] = await Promise.all([
      this.cache.getAllNamespaceStats(),
      this.cache.countKeys(),
      this.cache.getPopularQueries(POPULAR_QUERY_LIMIT),
    ]);

    return {
      backend: this.cache.backendName,
      totalKeys,
      namespaces,
      popularQueries,
    };
  }

  async clearCache(scope: CacheScope): Promise<number> {
    return this.cache.clear(scope);
  }

  async getCacheHealth(): Promise<CacheHealth> {
    try {
      const latencyMs = await this.cache.ping();
      return {
        status: 'healthy',
        backend: this.cache.backendName,
        connected: true,
        latencyMs,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Cache health check failed: ${message}`);
      return {
        status: 'unhealthy',
        backend: this.cache.backendName,
        connected: false,
        error: message,
      };
    }
  }

  async getHealth(): Promise<ServiceHealth> {
    const [cache, engineConnected] = await Promise.all([
      this.getCacheHealth(),
      this.engine.healthCheck(),
    ]);

    return {
      status: !engineConnected
        ? 'unhealthy'
        : cache.connected
          ? 'healthy'
          : 'degraded',
      cache,
      searchEngine: { connected: engineConnected },
      timestamp: new Date().toISOString(),
    };
  }
}

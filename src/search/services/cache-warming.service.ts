/**
 * Cache Warming Service
 * Replays the first page of the most popular queries so their results sit
 * in the result cache. Scheduled every 30 minutes when
 * CACHE_WARMING_ENABLED=true, or triggered on demand.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { CacheCoordinatorService } from '../cache/cache-coordinator.service';
import { SearchWorkflowService } from '../workflow/search-workflow.service';
import { errorMessage } from '../errors/search.errors';

export interface WarmingReport {
  requested: number;
  warmed: number;
  failed: number;
  durationMs: number;
}

@Injectable()
export class CacheWarmingService {
  private readonly logger = new Logger(CacheWarmingService.name);
  private readonly enabled: boolean;
  private readonly defaultLimit: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly cache: CacheCoordinatorService,
    private readonly workflow: SearchWorkflowService,
  ) {
    this.enabled = this.configService.get<boolean>('CACHE_WARMING_ENABLED', false);
    this.defaultLimit = this.configService.get<number>('CACHE_WARMING_LIMIT', 20);
  }

  /**
   * Replays sequentially; a failing query is counted and skipped
   */
  async warmPopularQueries(limit = this.defaultLimit): Promise<WarmingReport> {
    const startTime = Date.now();
    const popular = await this.cache.getPopularQueries(limit);

    let warmed = 0;
    let failed = 0;
    for (const { query } of popular) {
      try {
        await this.workflow.search(query, 1, undefined, true);
        warmed++;
      } catch (error) {
        failed++;
        this.logger.warn(
          `[CacheWarming] stage=warm substage=query status=failed error=${errorMessage(error)}`,
        );
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `[CacheWarming] stage=warm substage=batch status=completed warmed=${warmed} failed=${failed} duration=${durationMs}ms`,
    );

    return { requested: popular.length, warmed, failed, durationMs };
  }

  // every 30 minutes
  @Cron('*/30 * * * *')
  async scheduledWarming(): Promise<void> {
    if (!this.enabled) {
      return;
    }

    this.logger.log('Running scheduled cache warming...');
    await this.warmPopularQueries();
  }
}

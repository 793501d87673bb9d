/**
 * Admin Controller
 * Cache statistics and maintenance operations
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { CacheStatsService } from './services/cache-stats.service';
import {
  CacheWarmingService,
  type WarmingReport,
} from './services/cache-warming.service';
import { CacheMaintenanceService } from './services/cache-maintenance.service';
import {
  ClearCacheDto,
  WarmCacheDto,
  type CleanupResponse,
  type ClearCacheResponse,
} from './dto/cache-admin.dto';
import type { CacheStats } from './types/cache.types';

@Controller('admin/cache')
export class AdminController {
  private readonly logger = new Logger(AdminController.name);

  constructor(
    private readonly statsService: CacheStatsService,
    private readonly warmingService: CacheWarmingService,
    private readonly maintenanceService: CacheMaintenanceService,
  ) {}

  /**
   * GET /admin/cache/stats
   * Per-namespace hit/miss counters, key count and popular queries
   */
  @Get('stats')
  async getStats(): Promise<CacheStats> {
    return this.statsService.getCacheStats();
  }

  /**
   * POST /admin/cache/clear
   * { "scope": "all" | "filter_plan" | "embedding" | "result" }
   */
  @Post('clear')
  @HttpCode(HttpStatus.OK)
  async clear(@Body() body: ClearCacheDto): Promise<ClearCacheResponse> {
    this.logger.log(`Cache clear requested: scope=${body.scope}`);
    const cleared = await this.statsService.clearCache(body.scope);
    return { scope: body.scope, cleared };
  }

  /**
   * POST /admin/cache/warm
   * Replays the most popular queries; { "limit": 20 } is optional
   */
  @Post('warm')
  @HttpCode(HttpStatus.OK)
  async warm(@Body() body: WarmCacheDto): Promise<WarmingReport> {
    return this.warmingService.warmPopularQueries(body.limit);
  }

  /**
   * POST /admin/cache/cleanup
   * Sweeps expired entries from the in-process backend
   */
  @Post('cleanup')
  @HttpCode(HttpStatus.OK)
  async cleanup(): Promise<CleanupResponse> {
    const removed = await this.maintenanceService.cleanupExpired();
    return { removed };
  }
}

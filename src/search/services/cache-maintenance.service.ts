/**
 * Cache Maintenance Service
 * Sweeps expired entries out of the in-process backend. Redis expires keys
 * itself, so the sweep reports 0 there.
 */

import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { CacheCoordinatorService } from '../cache/cache-coordinator.service';

@Injectable()
export class CacheMaintenanceService {
  private readonly logger = new Logger(CacheMaintenanceService.name);

  constructor(private readonly cache: CacheCoordinatorService) {}

  async cleanupExpired(): Promise<number> {
    const removed = await this.cache.purgeExpired();
    this.logger.log(
      `[CacheMaintenance] stage=cleanup status=completed backend=${this.cache.backendName} removed=${removed}`,
    );
    return removed;
  }

  @Cron(CronExpression.EVERY_10_MINUTES)
  async scheduledCleanup(): Promise<void> {
    await this.cleanupExpired();
  }
}

/**
 * Search Module
 * Main module for property search functionality
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { WorkflowModule } from './workflow/workflow.module';
import { CacheStatsService } from './services/cache-stats.service';
import { CacheWarmingService } from './services/cache-warming.service';
import { CacheMaintenanceService } from './services/cache-maintenance.service';
import { SearchController } from './search.controller';
import { AdminController } from './admin.controller';
import { HealthController } from './health.controller';

@Module({
  imports: [ConfigModule, WorkflowModule],
  providers: [CacheStatsService, CacheWarmingService, CacheMaintenanceService],
  controllers: [SearchController, AdminController, HealthController],
})
export class SearchModule {}

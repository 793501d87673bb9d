import { Controller, Get } from '@nestjs/common';
import {
  CacheStatsService,
  type ServiceHealth,
} from './services/cache-stats.service';

@Controller('health')
export class HealthController {
  constructor(private readonly statsService: CacheStatsService) {}

  @Get()
  async check(): Promise<ServiceHealth> {
    return this.statsService.getHealth();
  }
}

/**
 * Cache Module
 * Selects the cache backend from config and exposes the cache coordinator.
 * CACHE_BACKEND=auto tries Redis first and falls back to the in-process map.
 */

import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CACHE_CONSTANTS } from '../types/cache.types';
import { errorMessage } from '../errors/search.errors';
import { CACHE_BACKEND, type CacheBackend } from './cache-backend.interface';
import { MemoryCacheBackend } from './memory-cache.backend';
import { RedisCacheBackend, buildRedisUrl } from './redis-cache.backend';
import { CacheCoordinatorService } from './cache-coordinator.service';

export type CacheBackendMode = 'auto' | 'memory' | 'redis';

export async function createCacheBackend(
  configService: ConfigService,
): Promise<CacheBackend> {
  const logger = new Logger('CacheBackendFactory');
  const mode = configService.get<CacheBackendMode>('CACHE_BACKEND', 'auto');

  const memory = () =>
    new MemoryCacheBackend({
      maxEntries: configService.get<number>(
        'CACHE_MEMORY_MAX_ENTRIES',
        CACHE_CONSTANTS.DEFAULT_MEMORY_MAX_ENTRIES,
      ),
    });

  if (mode === 'memory') {
    logger.log('Using in-memory cache backend');
    return memory();
  }

  const redisUrl = buildRedisUrl({
    url: configService.get<string>('REDIS_URL'),
    host: configService.get<string>('REDIS_HOST', 'localhost'),
    port: configService.get<number>('REDIS_PORT', 6379),
    password: configService.get<string>('REDIS_PASSWORD'),
    db: configService.get<number>('REDIS_DB', 0),
  });

  try {
    return await RedisCacheBackend.connect({
      url: redisUrl,
      connectTimeoutMs: configService.get<number>(
        'REDIS_CONNECT_TIMEOUT_MS',
        5000,
      ),
      commandTimeoutMs: configService.get<number>(
        'REDIS_COMMAND_TIMEOUT_MS',
        500,
      ),
    });
  } catch (error) {
    if (mode === 'redis') {
      throw error;
    }

    logger.warn(
      `Redis unavailable, falling back to in-memory cache: ${errorMessage(error)}`,
    );
    return memory();
  }
}

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CACHE_BACKEND,
      inject: [ConfigService],
      useFactory: createCacheBackend,
    },
    CacheCoordinatorService,
  ],
  exports: [CACHE_BACKEND, CacheCoordinatorService],
})
export class CacheModule implements OnApplicationShutdown {
  constructor(@Inject(CACHE_BACKEND) private readonly backend: CacheBackend) {}

  async onApplicationShutdown(): Promise<void> {
    await this.backend.close();
  }
}

/**
 * Environment validation
 * Converts and checks process.env at start-up; unset variables take the
 * defaults declared here.
 */

import { Transform, plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { EMBEDDING_PROVIDERS, type EmbeddingProvider } from '../search/providers/types';
import type { CacheBackendMode } from '../search/cache/cache.module';

function parseBoolean(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === '') {
    return false;
  }
  return value;
}

const CACHE_BACKEND_MODES: readonly CacheBackendMode[] = ['auto', 'memory', 'redis'];

export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 50055;

  @IsIn(['development', 'production', 'test'])
  NODE_ENV: string = 'development';

  @IsIn(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  LOG_LEVEL: string = 'info';

  @IsOptional()
  @IsString()
  LOG_FILE?: string;

  @IsString()
  SERVICE_NAME: string = 'property-search';

  // Cache
  @IsIn(CACHE_BACKEND_MODES)
  CACHE_BACKEND: CacheBackendMode = 'auto';

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsString()
  REDIS_HOST: string = 'localhost';

  @IsInt()
  REDIS_PORT: number = 6379;

  @IsOptional()
  @IsString()
  REDIS_PASSWORD?: string;

  @IsInt()
  @Min(0)
  REDIS_DB: number = 0;

  @IsInt()
  @Min(1)
  REDIS_CONNECT_TIMEOUT_MS: number = 5000;

  @IsInt()
  @Min(1)
  REDIS_COMMAND_TIMEOUT_MS: number = 500;

  @IsString()
  CACHE_KEY_PREFIX: string = 'property-search';

  @IsInt()
  @Min(1)
  CACHE_FILTER_PLAN_TTL: number = 600;

  @IsInt()
  @Min(1)
  CACHE_EMBEDDING_TTL: number = 3600;

  @IsInt()
  @Min(1)
  CACHE_RESULT_TTL: number = 300;

  @IsInt()
  @Min(1)
  CACHE_POPULAR_TTL: number = 1800;

  @IsInt()
  @Min(1)
  CACHE_STATS_TTL: number = 86400;

  @IsInt()
  @Min(1)
  CACHE_MEMORY_MAX_ENTRIES: number = 10000;

  // implicit conversion would turn the string "false" into true
  @Transform(({ obj, key }) => parseBoolean(obj[key]))
  @IsBoolean()
  CACHE_WARMING_ENABLED: boolean = false;

  @IsInt()
  @Min(1)
  CACHE_WARMING_LIMIT: number = 20;

  // Embeddings
  @IsIn(EMBEDDING_PROVIDERS)
  EMBEDDING_PROVIDER: EmbeddingProvider = 'openai';

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OPENAI_EMBEDDING_MODEL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_EMBEDDING_MODEL?: string;

  @IsOptional()
  @IsString()
  GOOGLE_API_KEY?: string;

  @IsOptional()
  @IsString()
  GOOGLE_EMBEDDING_MODEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  EMBEDDING_DIMENSION?: number;

  @IsInt()
  @Min(1)
  EMBEDDING_TIMEOUT_MS: number = 5000;

  // Search engine
  @IsUrl({ require_tld: false })
  QDRANT_URL: string = 'http://localhost:6333';

  @IsOptional()
  @IsString()
  QDRANT_API_KEY?: string;

  @IsString()
  SEARCH_COLLECTION: string = 'property_records';

  @IsString()
  SEARCH_VECTOR_FIELD: string = 'description_vector';

  @IsInt()
  @Min(1)
  SEARCH_KNN_CANDIDATES: number = 100;

  @IsInt()
  @Min(1)
  SEARCH_HYBRID_TIMEOUT_MS: number = 1000;

  @IsInt()
  @Min(1)
  SEARCH_KEYWORD_TIMEOUT_MS: number = 2000;

  @IsInt()
  @Min(1)
  @Max(100)
  SEARCH_DEFAULT_SIZE: number = 20;

  @IsInt()
  @Min(1)
  @Max(100)
  SEARCH_MAX_SIZE: number = 100;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated);
  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {})
          .map((message) => `  - ${message}`)
          .join('\n'),
      )
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}

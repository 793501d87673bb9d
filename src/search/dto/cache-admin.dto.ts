/**
 * Cache admin DTOs
 */

import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { CACHE_NAMESPACES, type CacheScope } from '../types/cache.types';

export const CACHE_SCOPES: readonly CacheScope[] = ['all', ...CACHE_NAMESPACES];

export class ClearCacheDto {
  @IsIn(CACHE_SCOPES)
  declare scope: CacheScope;
}

export class WarmCacheDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  declare limit?: number;
}

export interface ClearCacheResponse {
  scope: CacheScope;
  cleared: number;
}

export interface CleanupResponse {
  removed: number;
}

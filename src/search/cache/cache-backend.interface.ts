/**
 * Cache Backend contract
 * Raw key/value, counter and sorted-set operations over opaque string keys.
 * Implementations may throw; the cache coordinator absorbs every failure.
 */

export const CACHE_BACKEND = Symbol('CACHE_BACKEND');

export interface SortedSetEntry {
  member: string;
  score: number;
}

export interface CacheBackend {
  readonly name: 'memory' | 'redis';

  get(key: string): Promise<string | null>;

  /** Overwrites any existing value and restarts its TTL */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /** Returns the number of keys removed */
  deleteByPrefix(prefix: string): Promise<number>;

  countKeys(prefix: string): Promise<number>;

  /** Atomic increment; sets the key's TTL when given */
  increment(key: string, ttlSeconds?: number): Promise<number>;

  sortedSetIncrement(
    key: string,
    member: string,
    by: number,
    ttlSeconds?: number,
  ): Promise<void>;

  /** Highest scores first */
  sortedSetTop(key: string, limit: number): Promise<SortedSetEntry[]>;

  /** Drops expired entries eagerly; returns how many were removed */
  purgeExpired(): Promise<number>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

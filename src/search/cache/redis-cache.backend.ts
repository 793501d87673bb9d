/**
 * Redis cache backend
 * Shared networked backend for horizontally scaled deployments.
 * Every failure is rethrown as CacheBackendError.
 */

import { Logger } from '@nestjs/common';
import { createClient } from 'redis';
import { CacheBackendError, errorMessage } from '../errors/search.errors';
import { withTimeout } from '../../common/utils/with-timeout';
import type {
  CacheBackend,
  SortedSetEntry,
} from './cache-backend.interface';

type RedisClient = ReturnType<typeof createClient>;

const SCAN_BATCH = 500;

/** Reconnect attempts allowed before the initial connect gives up */
const CONNECT_RETRIES = 3;

const SCAN_TIMEOUT_FACTOR = 20;

export interface RedisConnectionOptions {
  url: string;
  /** Bound on connect + first PING (default 5000) */
  connectTimeoutMs?: number;
  /** Bound on every later command (default 500) */
  commandTimeoutMs?: number;
}

export function buildRedisUrl(options: {
  url?: string;
  host: string;
  port: number;
  password?: string;
  db: number;
}): string {
  if (options.url) {
    return options.url;
  }

  return options.password
    ? `redis://:${encodeURIComponent(options.password)}@${options.host}:${options.port}/${options.db}`
    : `redis://${options.host}:${options.port}/${options.db}`;
}

export class RedisCacheBackend implements CacheBackend {
  readonly name = 'redis';

  private readonly logger = new Logger(RedisCacheBackend.name);

  private constructor(
    private readonly client: RedisClient,
    private readonly commandTimeoutMs: number,
  ) {}

  /**
   * Connects and pings; rejects when Redis is not reachable within the
   * connect timeout. Once connected, the client reconnects in the background
   * and commands fail fast while it is offline.
   */
  static async connect(
    options: RedisConnectionOptions,
  ): Promise<RedisCacheBackend> {
    const logger = new Logger(RedisCacheBackend.name);
    const connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    let connected = false;

    const client = createClient({
      url: options.url,
      disableOfflineQueue: true,
      socket: {
        connectTimeout: connectTimeoutMs,
        reconnectStrategy: (retries) => {
          if (!connected && retries >= CONNECT_RETRIES) {
            return new Error(
              `Redis connection failed after ${CONNECT_RETRIES} attempts`,
            );
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', (error: unknown) => {
      logger.warn(`Redis client error: ${errorMessage(error)}`);
    });

    try {
      await withTimeout(
        client.connect().then(() => client.ping()),
        connectTimeoutMs,
        'Redis connect',
      );
    } catch (error) {
      if (client.isOpen) {
        await client.disconnect().catch((disconnectError: unknown) => {
          logger.warn(`Redis disconnect failed: ${errorMessage(disconnectError)}`);
        });
      }
      throw new CacheBackendError('connect', error);
    }

    connected = true;
    logger.log('Redis cache backend connected');
    return new RedisCacheBackend(client, options.commandTimeoutMs ?? 500);
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run('set', () =>
      ttlSeconds !== undefined && ttlSeconds > 0
        ? this.client.set(key, value, { EX: ttlSeconds })
        : this.client.set(key, value),
    );
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const keys = await this.scan(prefix);
    if (keys.length === 0) {
      return 0;
    }

    let removed = 0;
    for (let i = 0; i < keys.length; i += SCAN_BATCH) {
      const batch = keys.slice(i, i + SCAN_BATCH);
      removed += await this.run('del', () => this.client.del(batch));
    }
    return removed;
  }

  async countKeys(prefix: string): Promise<number> {
    const keys = await this.scan(prefix);
    return keys.length;
  }

  async increment(key: string, ttlSeconds?: number): Promise<number> {
    return this.run('incr', async () => {
      const value = await this.client.incr(key);
      if (ttlSeconds !== undefined && ttlSeconds > 0) {
        await this.client.expire(key, ttlSeconds);
      }
      return value;
    });
  }

  async sortedSetIncrement(
    key: string,
    member: string,
    by: number,
    ttlSeconds?: number,
  ): Promise<void> {
    await this.run('zincrby', async () => {
      await this.client.zIncrBy(key, by, member);
      if (ttlSeconds !== undefined && ttlSeconds > 0) {
        await this.client.expire(key, ttlSeconds);
      }
    });
  }

  async sortedSetTop(key: string, limit: number): Promise<SortedSetEntry[]> {
    if (limit <= 0) {
      return [];
    }

    const entries = await this.run('zrange', () =>
      this.client.zRangeWithScores(key, 0, limit - 1, { REV: true }),
    );
    return entries.map(({ value, score }) => ({ member: value, score }));
  }

  // Redis expires keys itself
  async purgeExpired(): Promise<number> {
    return 0;
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.client.ping());
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) {
      return;
    }

    try {
      await withTimeout(this.client.quit(), this.commandTimeoutMs, 'Redis quit');
    } catch (error) {
      this.logger.warn(`Redis quit failed: ${errorMessage(error)}`);
      if (this.client.isOpen) {
        await this.client.disconnect().catch((disconnectError: unknown) => {
          this.logger.warn(
            `Redis disconnect failed: ${errorMessage(disconnectError)}`,
          );
        });
      }
    }
  }

  // a full SCAN walks the keyspace in many round trips
  private async scan(prefix: string): Promise<string[]> {
    return this.run(
      'scan',
      async () => {
        const keys: string[] = [];
        for await (const key of this.client.scanIterator({
          MATCH: `${escapeGlob(prefix)}*`,
          COUNT: SCAN_BATCH,
        })) {
          keys.push(key);
        }
        return keys;
      },
      this.commandTimeoutMs * SCAN_TIMEOUT_FACTOR,
    );
  }

  private async run<T>(
    operation: string,
    fn: () => Promise<T>,
    timeoutMs = this.commandTimeoutMs,
  ): Promise<T> {
    try {
      return await withTimeout(fn(), timeoutMs, `Redis ${operation}`);
    } catch (error) {
      throw new CacheBackendError(operation, error);
    }
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

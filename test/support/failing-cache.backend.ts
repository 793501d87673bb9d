import { CacheBackendError } from '../../src/search/errors/search.errors';
import type {
  CacheBackend,
  SortedSetEntry,
} from '../../src/search/cache/cache-backend.interface';

/**
 * Backend whose every operation fails, as an unreachable Redis would
 */
export class FailingCacheBackend implements CacheBackend {
  readonly name = 'redis';

  private fail(operation: string): never {
    throw new CacheBackendError(operation, new Error('connection refused'));
  }

  async get(): Promise<string | null> {
    return this.fail('get');
  }

  async set(): Promise<void> {
    this.fail('set');
  }

  async deleteByPrefix(): Promise<number> {
    return this.fail('del');
  }

  async countKeys(): Promise<number> {
    return this.fail('scan');
  }

  async increment(): Promise<number> {
    return this.fail('incr');
  }

  async sortedSetIncrement(): Promise<void> {
    this.fail('zincrby');
  }

  async sortedSetTop(): Promise<SortedSetEntry[]> {
    return this.fail('zrange');
  }

  async purgeExpired(): Promise<number> {
    return this.fail('purge');
  }

  async ping(): Promise<void> {
    this.fail('ping');
  }

  async close(): Promise<void> {}
}

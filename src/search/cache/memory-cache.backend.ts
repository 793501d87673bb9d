/**
 * In-process cache backend
 * Single-process Map storage with lazy TTL expiry. Used when Redis is not
 * configured or not reachable, and in tests.
 */

import type {
  CacheBackend,
  SortedSetEntry,
} from './cache-backend.interface';

interface Expiring {
  createdAt: number;
  /** null = no TTL */
  expiresAt: number | null;
}

interface StoredValue extends Expiring {
  value: string;
}

interface StoredCounter extends Expiring {
  value: number;
}

interface StoredSortedSet extends Expiring {
  scores: Map<string, number>;
}

export interface MemoryCacheBackendOptions {
  /** Cap on value entries; the entry nearest to expiry is evicted first */
  maxEntries?: number;
  now?: () => number;
}

export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';

  private readonly values = new Map<string, StoredValue>();
  private readonly counters = new Map<string, StoredCounter>();
  private readonly sortedSets = new Map<string, StoredSortedSet>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheBackendOptions = {}) {
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(this.values, key);
    if (entry) {
      return entry.value;
    }

    // counters read back as their decimal string, as with GET after INCR
    const counter = this.live(this.counters, key);
    return counter ? String(counter.value) : null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (!this.values.has(key) && this.values.size >= this.maxEntries) {
      this.evictOne();
    }

    this.values.set(key, { value, ...this.stamp(ttlSeconds) });
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    this.purge();

    let removed = 0;
    for (const store of this.stores()) {
      for (const key of [...store.keys()]) {
        if (key.startsWith(prefix)) {
          store.delete(key);
          removed++;
        }
      }
    }
    return removed;
  }

  async countKeys(prefix: string): Promise<number> {
    this.purge();

    let count = 0;
    for (const store of this.stores()) {
      for (const key of store.keys()) {
        if (key.startsWith(prefix)) {
          count++;
        }
      }
    }
    return count;
  }

  async increment(key: string, ttlSeconds?: number): Promise<number> {
    const current = this.live(this.counters, key);
    const value = (current?.value ?? 0) + 1;

    this.counters.set(key, {
      value,
      ...(ttlSeconds !== undefined || !current
        ? this.stamp(ttlSeconds)
        : { createdAt: current.createdAt, expiresAt: current.expiresAt }),
    });
    return value;
  }

  async sortedSetIncrement(
    key: string,
    member: string,
    by: number,
    ttlSeconds?: number,
  ): Promise<void> {
    const current = this.live(this.sortedSets, key);
    const scores = current?.scores ?? new Map<string, number>();
    scores.set(member, (scores.get(member) ?? 0) + by);

    this.sortedSets.set(key, {
      scores,
      ...(ttlSeconds !== undefined || !current
        ? this.stamp(ttlSeconds)
        : { createdAt: current.createdAt, expiresAt: current.expiresAt }),
    });
  }

  async sortedSetTop(key: string, limit: number): Promise<SortedSetEntry[]> {
    const current = this.live(this.sortedSets, key);
    if (!current || limit <= 0) {
      return [];
    }

    // ties ordered like ZREVRANGE: reverse lexicographic member order
    return [...current.scores.entries()]
      .map(([member, score]) => ({ member, score }))
      .sort((a, b) =>
        b.score !== a.score
          ? b.score - a.score
          : a.member < b.member
            ? 1
            : a.member > b.member
              ? -1
              : 0,
      )
      .slice(0, limit);
  }

  async purgeExpired(): Promise<number> {
    return this.purge();
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.values.clear();
    this.counters.clear();
    this.sortedSets.clear();
  }

  private stamp(ttlSeconds?: number): Expiring {
    const createdAt = this.now();
    return {
      createdAt,
      expiresAt:
        ttlSeconds !== undefined && ttlSeconds > 0
          ? createdAt + ttlSeconds * 1000
          : null,
    };
  }

  private isExpired(entry: Expiring): boolean {
    return entry.expiresAt !== null && this.now() > entry.expiresAt;
  }

  /**
   * Returns the entry unless it has expired, in which case it is removed
   */
  private live<T extends Expiring>(
    store: Map<string, T>,
    key: string,
  ): T | undefined {
    const entry = store.get(key);
    if (entry && this.isExpired(entry)) {
      store.delete(key);
      return undefined;
    }
    return entry;
  }

  private stores(): Array<Map<string, Expiring>> {
    return [this.values, this.counters, this.sortedSets];
  }

  private purge(): number {
    let removed = 0;
    for (const store of this.stores()) {
      for (const [key, entry] of [...store.entries()]) {
        if (this.isExpired(entry)) {
          store.delete(key);
          removed++;
        }
      }
    }
    return removed;
  }

  private evictOne(): void {
    if (this.purge() > 0 && this.values.size < this.maxEntries) {
      return;
    }

    let victim: string | null = null;
    let victimExpiry = Number.POSITIVE_INFINITY;
    for (const [key, entry] of this.values) {
      const expiry = entry.expiresAt ?? Number.POSITIVE_INFINITY;
      if (victim === null || expiry < victimExpiry) {
        victim = key;
        victimExpiry = expiry;
      }
    }

    if (victim !== null) {
      this.values.delete(victim);
    }
  }
}

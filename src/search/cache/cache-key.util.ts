/**
 * Cache key derivation
 * Keys are `<prefix>:<namespace>:<sha256 hex>` over the namespace's inputs.
 */

import * as crypto from 'crypto';
import type { FilterPlan } from '../types/filter-plan.types';
import { CACHE_CONSTANTS, type CacheNamespace } from '../types/cache.types';

/**
 * JSON with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

function hashKey(prefix: string, namespace: CacheNamespace, material: string) {
  const digest = crypto.createHash('sha256').update(material).digest('hex');
  return `${prefix}:${CACHE_CONSTANTS.NAMESPACE_PREFIX[namespace]}:${digest}`;
}

export function filterPlanKey(prefix: string, normalizedQuery: string): string {
  return hashKey(prefix, 'filter_plan', normalizedQuery);
}

export function embeddingKey(prefix: string, normalizedQuery: string): string {
  return hashKey(prefix, 'embedding', normalizedQuery);
}

/**
 * Page size does not enter the key
 */
export function resultKey(
  prefix: string,
  normalizedQuery: string,
  page: number,
  plan: FilterPlan,
): string {
  return hashKey(
    prefix,
    'result',
    `${normalizedQuery}_${page}_${stableStringify(plan)}`,
  );
}

export function namespacePrefix(
  prefix: string,
  namespace: CacheNamespace,
): string {
  return `${prefix}:${CACHE_CONSTANTS.NAMESPACE_PREFIX[namespace]}:`;
}

export function statsKey(
  prefix: string,
  namespace: CacheNamespace,
  outcome: 'hits' | 'misses',
): string {
  return `${prefix}:${CACHE_CONSTANTS.STATS_PREFIX}:${namespace}:${outcome}`;
}

export function popularKey(prefix: string): string {
  return `${prefix}:${CACHE_CONSTANTS.POPULAR_KEY}`;
}

export function popularDisplayKey(
  prefix: string,
  normalizedQuery: string,
): string {
  const digest = crypto.createHash('sha256').update(normalizedQuery).digest('hex');
  return `${prefix}:${CACHE_CONSTANTS.POPULAR_KEY}:display:${digest}`;
}

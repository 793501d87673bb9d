/**
 * Filter Plan Types
 * Structured output of parsing free text into must/filter/sort conditions
 */

export type BoundKind = 'gte' | 'lte';

export type TermValue = string | number | boolean;

/**
 * Exact match on a scalar field
 */
export interface TermCondition {
  readonly kind: 'term';
  readonly field: string;
  readonly value: TermValue;
}

/**
 * One-sided numeric bound on a scalar field
 */
export interface RangeCondition {
  readonly kind: 'range';
  readonly field: string;
  readonly bound: BoundKind;
  readonly value: number;
}

/**
 * One-sided numeric bound on a field inside an array of objects.
 * `field` is relative to the elements of `path`.
 */
export interface NestedRangeCondition {
  readonly kind: 'nested_range';
  readonly path: string;
  readonly field: string;
  readonly bound: BoundKind;
  readonly value: number;
}

export type Condition = TermCondition | RangeCondition | NestedRangeCondition;

export type SortOrder = 'asc' | 'desc';

export interface SortClause {
  readonly field: string;
  readonly order: SortOrder;
  /** Array path the field lives under, when sorting on a nested value */
  readonly nestedPath?: string;
}

/**
 * `must` conditions take part in relevance scoring when combined with
 * vector search; `filter` conditions are a pure boolean gate.
 */
export interface FilterPlan {
  readonly must: readonly Condition[];
  readonly filter: readonly Condition[];
  readonly sort: readonly SortClause[] | null;
}

export function isEmptyPlan(plan: FilterPlan): boolean {
  return plan.must.length === 0 && plan.filter.length === 0;
}

function isBoundKind(value: unknown): value is BoundKind {
  return value === 'gte' || value === 'lte';
}

function isTermValue(value: unknown): value is TermValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function isCondition(value: unknown): value is Condition {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }

  if (!('field' in value) || typeof value.field !== 'string') {
    return false;
  }

  switch (value.kind) {
    case 'term':
      return 'value' in value && isTermValue(value.value);
    case 'range':
      return (
        'bound' in value &&
        isBoundKind(value.bound) &&
        'value' in value &&
        typeof value.value === 'number'
      );
    case 'nested_range':
      return (
        'path' in value &&
        typeof value.path === 'string' &&
        'bound' in value &&
        isBoundKind(value.bound) &&
        'value' in value &&
        typeof value.value === 'number'
      );
    default:
      return false;
  }
}

export function isSortClause(value: unknown): value is SortClause {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'field' in value &&
    typeof value.field === 'string' &&
    'order' in value &&
    (value.order === 'asc' || value.order === 'desc') &&
    (!('nestedPath' in value) || typeof value.nestedPath === 'string')
  );
}

/**
 * Type guard for filter plans read back from the cache
 */
export function isFilterPlan(value: unknown): value is FilterPlan {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (
    !('must' in value) ||
    !Array.isArray(value.must) ||
    !value.must.every(isCondition)
  ) {
    return false;
  }

  if (
    !('filter' in value) ||
    !Array.isArray(value.filter) ||
    !value.filter.every(isCondition)
  ) {
    return false;
  }

  if (!('sort' in value)) {
    return false;
  }

  return (
    value.sort === null ||
    (Array.isArray(value.sort) && value.sort.every(isSortClause))
  );
}

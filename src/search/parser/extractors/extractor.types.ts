import type { Condition, SortClause } from '../../types/filter-plan.types';

export interface ParserInput {
  /** Text as typed, for passes that depend on case */
  readonly original: string;
  /** Lowercased and trimmed */
  readonly normalized: string;
}

export type PlanContribution =
  | { readonly target: 'must' | 'filter'; readonly condition: Condition }
  | { readonly target: 'sort'; readonly clause: SortClause };

/**
 * One attribute category. Returns at most one contribution; `null` when
 * the category is absent from the text.
 */
export type Extractor = (input: ParserInput) => PlanContribution | null;

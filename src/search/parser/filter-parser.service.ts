/**
 * Filter Parser Service
 * Rule-based extraction of structured filters and sort intent from free text.
 * Pure and total: no I/O, never throws, identical input yields an identical plan.
 */

import { Injectable } from '@nestjs/common';
import type {
  Condition,
  FilterPlan,
  SortClause,
} from '../types/filter-plan.types';
import { EXTRACTORS, type Extractor } from './extractors';

@Injectable()
export class FilterParserService {
  parse(text: string): FilterPlan {
    return parseFilterPlan(text);
  }
}

export function normalizeQuery(text: string): string {
  return text.toLowerCase().trim();
}

export function parseFilterPlan(
  text: string,
  extractors: readonly Extractor[] = EXTRACTORS,
): FilterPlan {
  const input = { original: text, normalized: normalizeQuery(text) };

  const must: Condition[] = [];
  const filter: Condition[] = [];
  let sort: SortClause[] | null = null;

  for (const extract of extractors) {
    const contribution = extract(input);
    if (contribution === null) {
      continue;
    }

    switch (contribution.target) {
      case 'must':
        must.push(contribution.condition);
        break;
      case 'filter':
        filter.push(contribution.condition);
        break;
      case 'sort':
        // one sort clause at most; no compound sort
        if (sort === null) {
          sort = [contribution.clause];
        }
        break;
    }
  }

  return { must, filter, sort };
}

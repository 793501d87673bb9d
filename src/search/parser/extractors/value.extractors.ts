import type { BoundKind } from '../../types/filter-plan.types';
import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor } from './extractor.types';

const UPPER_BOUND_PATTERN = /(?:under|below|less than|max)\s*\$?\s*([\d,]+)(k)?/;
const LOWER_BOUND_PATTERN = /(?:over|above|more than|min)\s*\$?\s*([\d,]+)(k)?/;

/**
 * Below this magnitude a `k` suffix means thousands ("500k"); at or above
 * it the figure is taken as already written out ("500000k" stays 500000).
 */
export const K_SUFFIX_THRESHOLD = 10000;

/**
 * Parses "1,250", "500" + k, etc. Returns null when no digits remain.
 */
export function parseMonetaryAmount(
  digits: string,
  hasKSuffix: boolean,
): number | null {
  const cleaned = digits.replace(/,/g, '');
  if (cleaned.length === 0) {
    return null;
  }

  const value = parseInt(cleaned, 10);
  if (!Number.isFinite(value)) {
    return null;
  }

  return hasKSuffix && value < K_SUFFIX_THRESHOLD ? value * 1000 : value;
}

function assessedValueExtractor(pattern: RegExp, bound: BoundKind): Extractor {
  return ({ normalized }) => {
    const match = normalized.match(pattern);
    if (!match) {
      return null;
    }

    const value = parseMonetaryAmount(match[1], match[2] === 'k');
    if (value === null) {
      return null;
    }

    return {
      target: 'filter',
      condition: {
        kind: 'nested_range',
        path: PROPERTY_FIELDS.TAX_ASSESSMENT_PATH,
        field: PROPERTY_FIELDS.ASSESSED_VALUE,
        bound,
        value,
      },
    };
  };
}

export const extractMaxValue = assessedValueExtractor(UPPER_BOUND_PATTERN, 'lte');

export const extractMinValue = assessedValueExtractor(LOWER_BOUND_PATTERN, 'gte');

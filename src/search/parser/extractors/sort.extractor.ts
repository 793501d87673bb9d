import type { SortClause } from '../../types/filter-plan.types';
import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor } from './extractor.types';

interface SortIntent {
  readonly keywords: readonly string[];
  readonly clause: SortClause;
}

/**
 * Checked in order; the first category with a keyword present wins.
 * "least expensive" must be tested before "expensive".
 */
export const SORT_INTENTS: readonly SortIntent[] = [
  {
    keywords: ['cheap', 'affordable', 'lowest', 'least expensive'],
    clause: {
      field: PROPERTY_FIELDS.ASSESSED_VALUE,
      order: 'asc',
      nestedPath: PROPERTY_FIELDS.TAX_ASSESSMENT_PATH,
    },
  },
  {
    keywords: ['expensive', 'luxury', 'highest', 'most valuable', 'premium'],
    clause: {
      field: PROPERTY_FIELDS.ASSESSED_VALUE,
      order: 'desc',
      nestedPath: PROPERTY_FIELDS.TAX_ASSESSMENT_PATH,
    },
  },
  {
    keywords: ['largest', 'biggest', 'spacious'],
    clause: { field: PROPERTY_FIELDS.LIVING_AREA_SQFT, order: 'desc' },
  },
  {
    keywords: ['smallest', 'compact'],
    clause: { field: PROPERTY_FIELDS.LIVING_AREA_SQFT, order: 'asc' },
  },
];

export const extractSort: Extractor = ({ normalized }) => {
  const intent = SORT_INTENTS.find(({ keywords }) =>
    keywords.some((keyword) => normalized.includes(keyword)),
  );

  return intent ? { target: 'sort', clause: intent.clause } : null;
};

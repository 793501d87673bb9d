import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor } from './extractor.types';

/**
 * Keyword -> indexed land-use description, checked in this order
 */
export const LAND_USE_KEYWORDS: ReadonlyArray<readonly [string, string]> = [
  ['residential', 'RESIDENTIAL'],
  ['commercial', 'COMMERCIAL'],
  ['industrial', 'INDUSTRIAL'],
  ['agricultural', 'AGRICULTURAL'],
  ['vacant', 'VACANT'],
];

export const CORPORATE_SYNONYMS: readonly string[] = [
  'corporate',
  'company',
  'corporation',
  'llc',
  'inc',
];

export const extractLandUse: Extractor = ({ normalized }) => {
  const entry = LAND_USE_KEYWORDS.find(([keyword]) =>
    normalized.includes(keyword),
  );
  if (entry === undefined) {
    return null;
  }

  return {
    target: 'must',
    condition: {
      kind: 'term',
      field: PROPERTY_FIELDS.LAND_USE,
      value: entry[1],
    },
  };
};

export const extractCorporateOwner: Extractor = ({ normalized }) => {
  if (!CORPORATE_SYNONYMS.some((word) => normalized.includes(word))) {
    return null;
  }

  return {
    target: 'filter',
    condition: {
      kind: 'term',
      field: PROPERTY_FIELDS.CORPORATE_OWNER,
      value: true,
    },
  };
};

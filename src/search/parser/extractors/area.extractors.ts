import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor } from './extractor.types';

const SQFT_PATTERN = /(\d+)\s*(\+)?\s*(?:sq\.?\s*ft|square\s*feet|sqft)/;
const ACRES_PATTERN = /(\d+(?:\.\d+)?)\s*(\+)?\s*acres?/;

// Areas only ever produce a lower bound; a bare "1500 sqft" is too
// precise to match exactly and adds nothing to the plan.
function minimumAreaExtractor(
  pattern: RegExp,
  field: string,
  parse: (raw: string) => number,
): Extractor {
  return ({ normalized }) => {
    const match = normalized.match(pattern);
    if (!match || match[2] !== '+') {
      return null;
    }

    return {
      target: 'filter',
      condition: { kind: 'range', field, bound: 'gte', value: parse(match[1]) },
    };
  };
}

export const extractMinLivingArea = minimumAreaExtractor(
  SQFT_PATTERN,
  PROPERTY_FIELDS.LIVING_AREA_SQFT,
  (raw) => parseInt(raw, 10),
);

export const extractMinLotAcres = minimumAreaExtractor(
  ACRES_PATTERN,
  PROPERTY_FIELDS.LOT_ACRES,
  (raw) => parseFloat(raw),
);

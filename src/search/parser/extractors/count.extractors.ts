import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor, PlanContribution } from './extractor.types';

const BEDROOM_PATTERN = /(\d+)\s*(\+)?\s*(?:bed(?:room)?s?|br)/;
const BATHROOM_PATTERN = /(\d+(?:\.\d+)?)\s*(\+)?\s*(?:bath(?:room)?s?)/;

/**
 * "N unit" is an exact match scored with the query; "N+ unit" is a
 * lower bound applied as a filter.
 */
function countContribution(
  match: RegExpMatchArray,
  field: string,
  exact: (raw: string) => number,
  lowerBound: (raw: string) => number,
): PlanContribution {
  const raw = match[1];

  if (match[2] === '+') {
    return {
      target: 'filter',
      condition: { kind: 'range', field, bound: 'gte', value: lowerBound(raw) },
    };
  }

  return {
    target: 'must',
    condition: { kind: 'term', field, value: exact(raw) },
  };
}

export const extractBedrooms: Extractor = ({ normalized }) => {
  const match = normalized.match(BEDROOM_PATTERN);
  if (!match) {
    return null;
  }

  return countContribution(
    match,
    PROPERTY_FIELDS.BEDROOMS,
    (raw) => parseInt(raw, 10),
    (raw) => parseInt(raw, 10),
  );
};

export const extractBathrooms: Extractor = ({ normalized }) => {
  const match = normalized.match(BATHROOM_PATTERN);
  if (!match) {
    return null;
  }

  // exact counts are indexed as integers; "2.5 bath" matches 2
  return countContribution(
    match,
    PROPERTY_FIELDS.BATHROOMS,
    (raw) => Math.trunc(parseFloat(raw)),
    (raw) => parseFloat(raw),
  );
};

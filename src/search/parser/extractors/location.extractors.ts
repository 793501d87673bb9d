import cityGazetteer from '../data/cities.json';
import { PROPERTY_FIELDS } from '../property-fields';
import type { Extractor } from './extractor.types';

const STATE_CODE_PATTERN = /\b([A-Z]{2})\b/;
const COUNTY_PATTERN = /(\w+)\s+county/;

export const CITIES: readonly string[] = cityGazetteer;

/**
 * Plain substring lookup in gazetteer order. There is no word-boundary
 * check, so a city embedded in a longer word still matches.
 */
export const extractCity: Extractor = ({ normalized }) => {
  const city = CITIES.find((candidate) => normalized.includes(candidate));
  if (city === undefined) {
    return null;
  }

  return {
    target: 'must',
    condition: {
      kind: 'term',
      field: PROPERTY_FIELDS.CITY,
      value: city.toUpperCase(),
    },
  };
};

/**
 * Runs on the text as typed: lowercased words like "in" or "or" must not
 * read as state codes.
 */
export const extractStateCode: Extractor = ({ original }) => {
  const match = original.match(STATE_CODE_PATTERN);
  if (!match) {
    return null;
  }

  return {
    target: 'must',
    condition: { kind: 'term', field: PROPERTY_FIELDS.STATE, value: match[1] },
  };
};

export const extractCounty: Extractor = ({ normalized }) => {
  const match = normalized.match(COUNTY_PATTERN);
  if (!match) {
    return null;
  }

  return {
    target: 'must',
    condition: {
      kind: 'term',
      field: PROPERTY_FIELDS.COUNTY,
      value: match[1].toUpperCase(),
    },
  };
};

import { extractBathrooms, extractBedrooms } from './count.extractors';
import { extractMaxValue, extractMinValue } from './value.extractors';
import { extractMinLivingArea, extractMinLotAcres } from './area.extractors';
import { extractCity, extractCounty, extractStateCode } from './location.extractors';
import { extractCorporateOwner, extractLandUse } from './attribute.extractors';
import { extractSort } from './sort.extractor';
import type { Extractor } from './extractor.types';

export type { Extractor, ParserInput, PlanContribution } from './extractor.types';

/**
 * Every category runs against the same input and the results are
 * combined. The order fixes the position of each condition in the plan.
 */
export const EXTRACTORS: readonly Extractor[] = [
  extractBedrooms,
  extractBathrooms,
  extractMaxValue,
  extractMinValue,
  extractMinLivingArea,
  extractCity,
  extractStateCode,
  extractCounty,
  extractLandUse,
  extractCorporateOwner,
  extractMinLotAcres,
  extractSort,
];

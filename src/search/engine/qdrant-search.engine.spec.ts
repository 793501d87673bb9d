import {
  buildQdrantRequest,
  toQdrantCondition,
  toQdrantFilter,
  toQdrantOrderBy,
} from './qdrant-search.engine';
import type { EngineQuery } from './search-engine.interface';
import { PROPERTY_FIELDS } from '../parser/property-fields';

describe('Qdrant translation', () => {
  describe('toQdrantCondition', () => {
    it('maps a term to a match condition', () => {
      expect(
        toQdrantCondition({ kind: 'term', field: 'propertyAddress.city', value: 'AUSTIN' }),
      ).toEqual({ key: 'propertyAddress.city', match: { value: 'AUSTIN' } });
    });

    it('maps a range to a one-sided range condition', () => {
      expect(
        toQdrantCondition({ kind: 'range', field: 'beds', bound: 'gte', value: 3 }),
      ).toEqual({ key: 'beds', range: { gte: 3 } });
    });

    it('maps a nested range to a nested condition on the array path', () => {
      expect(
        toQdrantCondition({
          kind: 'nested_range',
          path: 'property_details.taxAssessment',
          field: 'assessedValue.calculatedTotalValue',
          bound: 'lte',
          value: 500000,
        }),
      ).toEqual({
        nested: {
          key: 'property_details.taxAssessment',
          filter: {
            must: [
              {
                key: 'assessedValue.calculatedTotalValue',
                range: { lte: 500000 },
              },
            ],
          },
        },
      });
    });
  });

  describe('toQdrantFilter', () => {
    it('has no filter for match_all', () => {
      expect(toQdrantFilter({ kind: 'match_all' })).toBeUndefined();
    });

    it('gates on must conditions first, then filter conditions', () => {
      expect(
        toQdrantFilter({
          kind: 'bool',
          must: [{ kind: 'term', field: 'city', value: 'AUSTIN' }],
          filter: [{ kind: 'range', field: 'beds', bound: 'gte', value: 3 }],
          should: [],
        }),
      ).toEqual({
        must: [
          { key: 'city', match: { value: 'AUSTIN' } },
          { key: 'beds', range: { gte: 3 } },
        ],
      });
    });
  });

  it('orders nested sort fields through the array path', () => {
    expect(
      toQdrantOrderBy({
        field: PROPERTY_FIELDS.ASSESSED_VALUE,
        order: 'asc',
        nestedPath: PROPERTY_FIELDS.TAX_ASSESSMENT_PATH,
      }),
    ).toEqual({
      key: `${PROPERTY_FIELDS.TAX_ASSESSMENT_PATH}[].${PROPERTY_FIELDS.ASSESSED_VALUE}`,
      direction: 'asc',
    });
  });

  describe('buildQdrantRequest', () => {
    const base: EngineQuery = {
      clause: {
        kind: 'bool',
        must: [{ kind: 'term', field: 'city', value: 'AUSTIN' }],
        filter: [],
        should: [],
      },
      vector: null,
      sort: null,
      offset: 20,
      limit: 10,
      timeoutMs: 1500,
    };
    const filter = { must: [{ key: 'city', match: { value: 'AUSTIN' } }] };

    it('builds a filter-only request for keyword queries', () => {
      expect(buildQdrantRequest(base)).toEqual({
        filter,
        offset: 20,
        limit: 10,
        with_payload: true,
        timeout: 2,
      });
    });

    it('orders keyword queries by the explicit sort', () => {
      expect(
        buildQdrantRequest({ ...base, sort: [{ field: 'area', order: 'desc' }] })
          .query,
      ).toEqual({ order_by: { key: 'area', direction: 'desc' } });
    });

    it('prefetches k candidates and re-scores them by the vector', () => {
      const request = buildQdrantRequest({
        ...base,
        vector: { field: 'description_vector', vector: [0.5, 0.25], k: 100 },
      });

      expect(request).toEqual({
        filter,
        offset: 20,
        limit: 10,
        with_payload: true,
        timeout: 2,
        prefetch: {
          query: [0.5, 0.25],
          using: 'description_vector',
          filter,
          limit: 100,
        },
        query: [0.5, 0.25],
        using: 'description_vector',
      });
    });

    it('replaces similarity ordering with the explicit sort', () => {
      const request = buildQdrantRequest({
        ...base,
        clause: { kind: 'match_all' },
        vector: { field: 'description_vector', vector: [0.5], k: 50 },
        sort: [{ field: 'area', order: 'asc' }],
      });

      expect(request.prefetch).toEqual({
        query: [0.5],
        using: 'description_vector',
        limit: 50,
      });
      expect(request.query).toEqual({ order_by: { key: 'area', direction: 'asc' } });
      expect(request.using).toBeUndefined();
      expect(request.filter).toBeUndefined();
    });
  });
});

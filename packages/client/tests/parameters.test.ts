import { describe, expect, it } from 'vitest';
import { MAX_LOCATIONS, appendLocation, createParameters, serializeParameters, wireKey } from '../src/parameters.js';

describe('query parameters', () => {
  it('serializes nothing when no field is set', () => {
    expect(serializeParameters(createParameters())).toEqual([]);
  });

  it('omits flags that are not set to true', () => {
    expect(serializeParameters({ locations: [], fullTime: false, partTime: undefined })).toEqual([]);
    expect(serializeParameters({ locations: [], fullTime: true })).toEqual([['full_time', '1']]);
  });

  it('keeps zero for numeric fields', () => {
    expect(serializeParameters({ locations: [], distance: 0, salaryMax: 85000.5 })).toEqual([
      ['distance', '0'],
      ['salary_max', '85000.5'],
    ]);
  });

  it('writes locations first, in insertion order', () => {
    const params = createParameters();
    params.what = 'nurse';
    appendLocation(params, 'UK');
    appendLocation(params, 'Scotland');

    expect(serializeParameters(params)).toEqual([
      ['location0', 'UK'],
      ['location1', 'Scotland'],
      ['what', 'nurse'],
    ]);
  });

  it('drops locations past the eighth slot', () => {
    const params = createParameters();
    for (let level = 0; level < 9; level++) {
      appendLocation(params, `level-${level}`);
    }

    expect(params.locations).toHaveLength(MAX_LOCATIONS);
    expect(params.locations[7]).toBe('level-7');
    expect(serializeParameters(params).map(([key]) => key)).toEqual([
      'location0',
      'location1',
      'location2',
      'location3',
      'location4',
      'location5',
      'location6',
      'location7',
    ]);
  });

  it('derives wire keys from field names', () => {
    expect(wireKey('salaryIncludeUnknown')).toBe('salary_include_unknown');
    expect(wireKey('resultsPerPage')).toBe('results_per_page');
    expect(wireKey('where')).toBe('where');
  });
});

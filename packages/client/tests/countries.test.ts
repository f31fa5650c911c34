import { describe, expect, it } from 'vitest';
import { COUNTRY_CODES, countryCode, isCountry } from '../src/countries.js';

describe('countries', () => {
  it('maps countries to their path codes', () => {
    expect(countryCode('UnitedKingdom')).toBe('gb');
    expect(countryCode('UnitedStates')).toBe('us');
    expect(countryCode('Netherlands')).toBe('nl');
    expect(countryCode('NewZealand')).toBe('nz');
    expect(countryCode('SouthAfrica')).toBe('za');
  });

  it('gives every country its own code', () => {
    const codes = Object.values(COUNTRY_CODES);

    expect(codes).toHaveLength(20);
    expect(new Set(codes).size).toBe(20);
  });

  it('recognises country names only', () => {
    expect(isCountry('Germany')).toBe(true);
    expect(isCountry('de')).toBe(false);
    expect(isCountry('toString')).toBe(false);
    expect(isCountry(undefined)).toBe(false);
  });
});

/**
 * Countries served by the API, keyed by name, with the lowercase code used as
 * the `/jobs/{country}` path segment.
 */
export const COUNTRY_CODES = {
  UnitedKingdom: 'gb',
  UnitedStates: 'us',
  Austria: 'at',
  Australia: 'au',
  Belgium: 'be',
  Brazil: 'br',
  Canada: 'ca',
  Switzerland: 'ch',
  Germany: 'de',
  Spain: 'es',
  France: 'fr',
  India: 'in',
  Italy: 'it',
  Mexico: 'mx',
  Netherlands: 'nl',
  NewZealand: 'nz',
  Poland: 'pl',
  Russia: 'ru',
  Singapore: 'sg',
  SouthAfrica: 'za',
} as const;

export type Country = keyof typeof COUNTRY_CODES;
export type CountryCode = (typeof COUNTRY_CODES)[Country];

export const DEFAULT_COUNTRY: Country = 'UnitedStates';

export function countryCode(country: Country): CountryCode {
  return COUNTRY_CODES[country];
}

export function isCountry(value: unknown): value is Country {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(COUNTRY_CODES, value);
}

import type { SortBy, SortDirection } from './sorting.js';

/** The API reads hierarchical location filters from `location0`..`location7`. */
export const MAX_LOCATIONS = 8;

export interface QueryParameters {
  what?: string;
  whatAnd?: string;
  whatPhrase?: string;
  whatOr?: string;
  whatExclude?: string;
  titleOnly?: string;
  where?: string;
  category?: string;
  company?: string;
  distance?: number;
  resultsPerPage?: number;
  maxDaysOld?: number;
  salaryMin?: number;
  salaryMax?: number;
  months?: number;
  sortBy?: SortBy;
  sortDir?: SortDirection;
  fullTime?: boolean;
  partTime?: boolean;
  contract?: boolean;
  permanent?: boolean;
  salaryIncludeUnknown?: boolean;
  locations: string[];
}

export type ScalarKey = Exclude<keyof QueryParameters, 'locations'>;

/** Serialization order of the scalar fields, after the locations. */
const SCALAR_FIELDS = [
  'what',
  'whatAnd',
  'whatPhrase',
  'whatOr',
  'whatExclude',
  'titleOnly',
  'where',
  'category',
  'company',
  'distance',
  'resultsPerPage',
  'maxDaysOld',
  'salaryMin',
  'salaryMax',
  'months',
  'sortBy',
  'sortDir',
  'fullTime',
  'partTime',
  'contract',
  'permanent',
  'salaryIncludeUnknown',
] as const satisfies readonly ScalarKey[];

/** `resultsPerPage` -> `results_per_page` */
export function wireKey(field: ScalarKey): string {
  return field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function createParameters(): QueryParameters {
  return { locations: [] };
}

/**
 * Append a location level. Once all slots are taken further values are dropped
 * and the existing slots stay as they were.
 */
export function appendLocation(params: QueryParameters, location: string): void {
  if (params.locations.length < MAX_LOCATIONS) {
    params.locations.push(location);
  }
}

function encodeValue(value: string | number | boolean): string | undefined {
  if (typeof value === 'boolean') {
    // flags are sent as the literal "1" and never as "0"
    return value ? '1' : undefined;
  }

  return String(value);
}

/**
 * Serialize the set fields to `[wireKey, value]` pairs.
 * Unset fields are omitted rather than sent empty.
 */
export function serializeParameters(params: QueryParameters): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];

  params.locations.slice(0, MAX_LOCATIONS).forEach((location, index) => {
    pairs.push([`location${index}`, location]);
  });

  for (const key of SCALAR_FIELDS) {
    const value = params[key];
    if (value === undefined) {
      continue;
    }

    const encoded = encodeValue(value);
    if (encoded !== undefined) {
      pairs.push([wireKey(key), encoded]);
    }
  }

  return pairs;
}

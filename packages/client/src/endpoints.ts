import type { z } from 'zod';
import {
  categoriesSchema,
  historicalSalarySchema,
  jobGeoDataSchema,
  jobSearchResultsSchema,
  salaryHistogramSchema,
  topCompaniesSchema,
  versionSchema,
} from '@adzuna-kit/models';

/**
 * `root` routes hang directly off the API root; `country` routes live under
 * `/jobs/{country}`.
 */
export type EndpointScope = 'root' | 'country';

export interface EndpointDescriptor<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  route: string;
  scope: EndpointScope;
  schema: TSchema;
}

/**
 * Typed helper for endpoint declarations. The scope decides the request path
 * built by `EndpointRequest.path()`.
 */
export function defineEndpoint<TSchema extends z.ZodTypeAny>(
  endpoint: EndpointDescriptor<TSchema>,
): EndpointDescriptor<TSchema> {
  return endpoint;
}

export const versionEndpoint = defineEndpoint({
  name: 'version',
  route: 'version',
  scope: 'root',
  schema: versionSchema,
});

export const categoriesEndpoint = defineEndpoint({
  name: 'categories',
  route: 'categories',
  scope: 'country',
  schema: categoriesSchema,
});

export const histogramEndpoint = defineEndpoint({
  name: 'histogram',
  route: 'histogram',
  scope: 'country',
  schema: salaryHistogramSchema,
});

export const topCompaniesEndpoint = defineEndpoint({
  name: 'top_companies',
  route: 'top_companies',
  scope: 'country',
  schema: topCompaniesSchema,
});

export const geodataEndpoint = defineEndpoint({
  name: 'geodata',
  route: 'geodata',
  scope: 'country',
  schema: jobGeoDataSchema,
});

export const historyEndpoint = defineEndpoint({
  name: 'history',
  route: 'history',
  scope: 'country',
  schema: historicalSalarySchema,
});

export const searchEndpoint = defineEndpoint({
  name: 'search',
  route: 'search',
  scope: 'country',
  schema: jobSearchResultsSchema,
});

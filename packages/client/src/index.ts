export { AdzunaClient } from './client.js';
export { resolveClientOptions, DEFAULT_BASE_URL } from './config.js';
export type { AdzunaClientOptions, AdzunaEnv } from './config.js';
export { createAdzunaLogger } from './logger.js';
export { COUNTRY_CODES, DEFAULT_COUNTRY, countryCode, isCountry } from './countries.js';
export type { Country, CountryCode } from './countries.js';
export { SORT_BY_VALUES, SORT_DIRECTIONS } from './sorting.js';
export type { SortBy, SortDirection } from './sorting.js';
export { MAX_LOCATIONS, serializeParameters } from './parameters.js';
export type { QueryParameters } from './parameters.js';
export {
  defineEndpoint,
  versionEndpoint,
  categoriesEndpoint,
  histogramEndpoint,
  topCompaniesEndpoint,
  geodataEndpoint,
  historyEndpoint,
  searchEndpoint,
} from './endpoints.js';
export type { EndpointDescriptor, EndpointScope } from './endpoints.js';
export {
  EndpointRequest,
  CountryRequest,
  LocatedRequest,
  VersionRequest,
  CategoriesRequest,
  GeodataRequest,
  HistoryRequest,
  HistogramRequest,
  TopCompaniesRequest,
  SearchRequest,
} from './requests.js';
export type { FetchResult, PreparedRequest, RequestExecutor } from './requests.js';
export { AdzunaError, AdzunaTransportError, AdzunaApiError, AdzunaDecodeError, isAdzunaError } from './errors.js';
export type { AdzunaErrorKind } from './errors.js';
export type * from '@adzuna-kit/models';

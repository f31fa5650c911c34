import type { z } from 'zod';
import { type Country, type CountryCode, DEFAULT_COUNTRY, countryCode } from './countries.js';
import {
  type EndpointDescriptor,
  categoriesEndpoint,
  geodataEndpoint,
  histogramEndpoint,
  historyEndpoint,
  searchEndpoint,
  topCompaniesEndpoint,
  versionEndpoint,
} from './endpoints.js';
import { type AdzunaError, isAdzunaError } from './errors.js';
import { type QueryParameters, appendLocation, createParameters, serializeParameters } from './parameters.js';
import type { SortBy, SortDirection } from './sorting.js';

/** A fully configured request, ready to be sent. */
export interface PreparedRequest<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  endpoint: EndpointDescriptor<TSchema>;
  path: string;
  params: Array<[string, string]>;
}

export interface RequestExecutor {
  execute<TSchema extends z.ZodTypeAny>(request: PreparedRequest<TSchema>): Promise<z.output<TSchema>>;
}

export type FetchResult<T> = { success: true; data: T } | { success: false; error: AdzunaError };

/**
 * Shared behaviour of every endpoint builder. Subclasses only expose the
 * setters their route accepts; each setter mutates the builder and returns it.
 *
 * Calling `fetch()` again re-sends the same request.
 */
export abstract class EndpointRequest<TSchema extends z.ZodTypeAny> {
  protected readonly params: QueryParameters = createParameters();
  protected code: CountryCode = countryCode(DEFAULT_COUNTRY);

  protected constructor(
    private readonly executor: RequestExecutor,
    protected readonly endpoint: EndpointDescriptor<TSchema>,
  ) {}

  /** Path below the API root, e.g. `/jobs/us/categories`. */
  path(): string {
    if (this.endpoint.scope === 'root') {
      return `/${this.endpoint.route}`;
    }

    return `/jobs/${this.code}/${this.endpoint.route}`;
  }

  /** Query parameters set on this builder, without credentials. */
  searchParams(): URLSearchParams {
    return new URLSearchParams(serializeParameters(this.params));
  }

  prepare(): PreparedRequest<TSchema> {
    return {
      endpoint: this.endpoint,
      path: this.path(),
      params: serializeParameters(this.params),
    };
  }

  fetch(): Promise<z.output<TSchema>> {
    return this.executor.execute(this.prepare());
  }

  /** Like `fetch()`, but resolves with the failure instead of rejecting. */
  async safeFetch(): Promise<FetchResult<z.output<TSchema>>> {
    try {
      return { success: true, data: await this.fetch() };
    } catch (error) {
      if (isAdzunaError(error)) {
        return { success: false, error };
      }

      throw error;
    }
  }
}

export abstract class CountryRequest<TSchema extends z.ZodTypeAny> extends EndpointRequest<TSchema> {
  /** Filter with a country of interest. Defaults to the United States. */
  country(country: Country): this {
    this.code = countryCode(country);
    return this;
  }
}

export abstract class LocatedRequest<TSchema extends z.ZodTypeAny> extends CountryRequest<TSchema> {
  /**
   * Filter by a location level, broadest first, in the form returned in a
   * location's `area`. Up to eight levels are kept.
   */
  location(location: string): this {
    appendLocation(this.params, location);
    return this;
  }

  /** Filter with a category tag, as returned by the categories endpoint. */
  category(category: string): this {
    this.params.category = category;
    return this;
  }
}

export class VersionRequest extends EndpointRequest<typeof versionEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, versionEndpoint);
  }
}

export class CategoriesRequest extends CountryRequest<typeof categoriesEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, categoriesEndpoint);
  }
}

export class GeodataRequest extends LocatedRequest<typeof geodataEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, geodataEndpoint);
  }
}

export class HistoryRequest extends LocatedRequest<typeof historyEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, historyEndpoint);
  }

  /** Number of months back to retrieve salary data for. */
  months(months: number): this {
    this.params.months = months;
    return this;
  }
}

export class HistogramRequest extends LocatedRequest<typeof histogramEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, histogramEndpoint);
  }

  /** Filter by keywords. Multiple terms may be space separated. */
  what(what: string): this {
    this.params.what = what;
    return this;
  }
}

export class TopCompaniesRequest extends LocatedRequest<typeof topCompaniesEndpoint.schema> {
  constructor(executor: RequestExecutor) {
    super(executor, topCompaniesEndpoint);
  }

  /** Filter by keywords. Multiple terms may be space separated. */
  what(what: string): this {
    this.params.what = what;
    return this;
  }
}

export class SearchRequest extends LocatedRequest<typeof searchEndpoint.schema> {
  private currentPage = 1;

  constructor(executor: RequestExecutor) {
    super(executor, searchEndpoint);
  }

  path(): string {
    return `${super.path()}/${this.currentPage}`;
  }

  /** Page of results to fetch, starting at 1. Zero and negative values are ignored. */
  page(page: number): this {
    if (Number.isInteger(page) && page > 0) {
      this.currentPage = page;
    }
    return this;
  }

  /** Filter by keywords. Multiple terms may be space separated. */
  what(what: string): this {
    this.params.what = what;
    return this;
  }

  /** All keywords must be found. */
  whatAnd(whatAnd: string): this {
    this.params.whatAnd = whatAnd;
    return this;
  }

  /** An entire phrase which must be found in the title or description. */
  whatPhrase(whatPhrase: string): this {
    this.params.whatPhrase = whatPhrase;
    return this;
  }

  /** Any of the keywords may be found. */
  whatOr(whatOr: string): this {
    this.params.whatOr = whatOr;
    return this;
  }

  /** Exclude jobs mentioning any of these keywords. */
  whatExclude(whatExclude: string): this {
    this.params.whatExclude = whatExclude;
    return this;
  }

  /** Keywords searched in the title only. */
  titleOnly(titleOnly: string): this {
    this.params.titleOnly = titleOnly;
    return this;
  }

  /** Geographic centre of the search: a place name, postal code, etc. */
  where(where: string): this {
    this.params.where = where;
    return this;
  }

  /**
   * Canonical company name, as found in a company's `canonical_name`.
   * The API offers no full list of accepted values.
   */
  company(company: string): this {
    this.params.company = company;
    return this;
  }

  /** Kilometres from the centre of the `where` place. The API defaults to 5. */
  distance(distance: number): this {
    this.params.distance = distance;
    return this;
  }

  /** Zero and negative values are ignored. */
  resultsPerPage(resultsPerPage: number): this {
    if (Number.isInteger(resultsPerPage) && resultsPerPage > 0) {
      this.params.resultsPerPage = resultsPerPage;
    }
    return this;
  }

  /** Age in days of the oldest advertisement returned. */
  maxDaysOld(maxDaysOld: number): this {
    this.params.maxDaysOld = maxDaysOld;
    return this;
  }

  salaryMin(salaryMin: number): this {
    this.params.salaryMin = salaryMin;
    return this;
  }

  salaryMax(salaryMax: number): this {
    this.params.salaryMax = salaryMax;
    return this;
  }

  sortBy(sortBy: SortBy): this {
    this.params.sortBy = sortBy;
    return this;
  }

  sortDir(sortDir: SortDirection): this {
    this.params.sortDir = sortDir;
    return this;
  }

  /** Include jobs with unknown salaries in salary-filtered results. */
  salaryIncludeUnknown(): this {
    this.params.salaryIncludeUnknown = true;
    return this;
  }

  fullTime(): this {
    this.params.fullTime = true;
    return this;
  }

  partTime(): this {
    this.params.partTime = true;
    return this;
  }

  contract(): this {
    this.params.contract = true;
    return this;
  }

  permanent(): this {
    this.params.permanent = true;
    return this;
  }
}

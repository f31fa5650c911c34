import type { Logger } from 'pino';
import type { z } from 'zod';
import { type ApiException, apiExceptionSchema } from '@adzuna-kit/models';
import {
  type AdzunaClientOptions,
  type AdzunaEnv,
  DEFAULT_BASE_URL,
  normalizeBaseUrl,
  resolveClientOptions,
} from './config.js';
import { AdzunaApiError, AdzunaDecodeError, AdzunaTransportError, isAdzunaError } from './errors.js';
import { createAdzunaLogger } from './logger.js';
import {
  CategoriesRequest,
  GeodataRequest,
  HistogramRequest,
  HistoryRequest,
  type PreparedRequest,
  type RequestExecutor,
  SearchRequest,
  TopCompaniesRequest,
  VersionRequest,
} from './requests.js';

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    // the status is still worth reporting without a body
    return '';
  }
}

function parseApiException(body: string): ApiException | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return undefined;
  }

  const result = apiExceptionSchema.safeParse(payload);
  return result.success ? result.data : undefined;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Entry point for the Adzuna API. Holds the credentials and hands out one
 * builder per endpoint; nothing is sent until a builder's `fetch()` runs.
 *
 * The client keeps no per-request state, so builders may be fetched concurrently.
 */
export class AdzunaClient implements RequestExecutor {
  private readonly appId: string;
  private readonly appKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: AdzunaClientOptions) {
    const appId = options.appId.trim();
    const appKey = options.appKey.trim();
    if (!appId || !appKey) {
      throw new Error('Adzuna client requires appId and appKey');
    }

    this.appId = appId;
    this.appKey = appKey;
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_BASE_URL);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createAdzunaLogger(options.logLevel);
  }

  /** Build a client from ADZUNA_* environment variables. */
  static fromEnv(env: AdzunaEnv = process.env, overrides: Partial<AdzunaClientOptions> = {}): AdzunaClient {
    return new AdzunaClient({ ...resolveClientOptions(env), ...overrides });
  }

  version(): VersionRequest {
    return new VersionRequest(this);
  }

  categories(): CategoriesRequest {
    return new CategoriesRequest(this);
  }

  histogram(): HistogramRequest {
    return new HistogramRequest(this);
  }

  topCompanies(): TopCompaniesRequest {
    return new TopCompaniesRequest(this);
  }

  geodata(): GeodataRequest {
    return new GeodataRequest(this);
  }

  history(): HistoryRequest {
    return new HistoryRequest(this);
  }

  search(): SearchRequest {
    return new SearchRequest(this);
  }

  /** Send one GET for a prepared request and decode the body with the endpoint schema. */
  async execute<TSchema extends z.ZodTypeAny>(request: PreparedRequest<TSchema>): Promise<z.output<TSchema>> {
    const startedAt = Date.now();
    const context = {
      endpoint: request.endpoint.name,
      path: request.path,
    };

    this.logger.debug(
      {
        event: 'request_started',
        ...context,
        params: Object.fromEntries(request.params),
      },
      'Adzuna request started',
    );

    try {
      const data = await this.send(request);
      this.logger.debug(
        {
          event: 'request_completed',
          ...context,
          durationMs: Date.now() - startedAt,
        },
        'Adzuna request completed',
      );
      return data;
    } catch (error) {
      this.logger.warn(
        {
          event: 'request_failed',
          ...context,
          durationMs: Date.now() - startedAt,
          kind: isAdzunaError(error) ? error.kind : 'unknown',
          status: isAdzunaError(error) ? error.status : undefined,
          error: error instanceof Error ? error.message : String(error),
        },
        'Adzuna request failed',
      );
      throw error;
    }
  }

  private buildUrl(request: PreparedRequest): string {
    const url = new URL(`${this.baseUrl}${request.path}`);
    url.searchParams.append('app_id', this.appId);
    url.searchParams.append('app_key', this.appKey);
    for (const [key, value] of request.params) {
      url.searchParams.append(key, value);
    }

    return url.toString();
  }

  private async send<TSchema extends z.ZodTypeAny>(request: PreparedRequest<TSchema>): Promise<z.output<TSchema>> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(request), {
        method: 'GET',
        headers: { Accept: 'application/json' },
      });
    } catch (error) {
      throw new AdzunaTransportError(request.path, error);
    }

    if (response.status !== 200) {
      const body = await readBody(response);
      throw new AdzunaApiError(request.path, response.status, body, parseApiException(body));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new AdzunaDecodeError(request.path, 'body is not valid JSON', [], error);
    }

    const result = request.endpoint.schema.safeParse(payload);
    if (!result.success) {
      throw new AdzunaDecodeError(request.path, formatIssues(result.error.issues), result.error.issues);
    }

    return result.data;
  }
}

import type { ZodIssue } from 'zod';
import type { ApiException } from '@adzuna-kit/models';

export type AdzunaErrorKind = 'transport' | 'api' | 'decode';

export abstract class AdzunaError extends Error {
  abstract readonly kind: AdzunaErrorKind;
  /** HTTP status reported by the API. Only set for `api` failures. */
  readonly status?: number;
  readonly path: string;

  protected constructor(message: string, path: string, options?: { cause?: unknown; status?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options?.cause });
    this.path = path;
    this.status = options?.status;
  }
}

/** No response was obtained: DNS, connection reset, aborted request. */
export class AdzunaTransportError extends AdzunaError {
  readonly kind = 'transport';

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Adzuna API request to ${path} failed: ${reason}`, path, { cause });
    this.name = 'AdzunaTransportError';
  }
}

/** The API answered with a status other than 200. */
export class AdzunaApiError extends AdzunaError {
  readonly kind = 'api';
  declare readonly status: number;
  readonly body: string;
  readonly exception?: ApiException;

  constructor(path: string, status: number, body: string, exception?: ApiException) {
    const detail = exception ? `: ${exception.exception} ${exception.doc}` : '';
    super(`Adzuna API returned ${status} for ${path}${detail}`, path, { status });
    this.name = 'AdzunaApiError';
    this.body = body;
    this.exception = exception;
  }
}

/** The API answered 200 but the body is not JSON or does not match the response schema. */
export class AdzunaDecodeError extends AdzunaError {
  readonly kind = 'decode';
  readonly issues: ZodIssue[];

  constructor(path: string, reason: string, issues: ZodIssue[] = [], cause?: unknown) {
    super(`Adzuna API response parse failed for ${path}: ${reason}`, path, { cause });
    this.name = 'AdzunaDecodeError';
    this.issues = issues;
  }
}

export function isAdzunaError(value: unknown): value is AdzunaError {
  return value instanceof AdzunaError;
}

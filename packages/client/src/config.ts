import type { LevelWithSilent, Logger } from 'pino';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

export const DEFAULT_BASE_URL = 'https://api.adzuna.com/v1/api';

export interface AdzunaClientOptions {
  appId: string;
  appKey: string;
  /** API root, without a trailing slash. */
  baseUrl?: string;
  logger?: Logger;
  logLevel?: LevelWithSilent;
  fetchImpl?: typeof fetch;
}

const envSchema = z.object({
  ADZUNA_APP_ID: z.string().trim().min(1),
  ADZUNA_APP_KEY: z.string().trim().min(1),
  ADZUNA_BASE_URL: z.string().trim().url().optional(),
  ADZUNA_LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
});

export type AdzunaEnv = Record<string, string | undefined>;

/**
 * Read client options from environment variables.
 * Blank values count as unset; logging stays silent unless the record sets
 * ADZUNA_LOG_LEVEL.
 */
export function resolveClientOptions(env: AdzunaEnv): AdzunaClientOptions {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('ADZUNA_') && value?.trim()),
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new Error(`Invalid Adzuna client environment: ${names.join(', ')}`);
  }

  const parsed = result.data;
  return {
    appId: parsed.ADZUNA_APP_ID,
    appKey: parsed.ADZUNA_APP_KEY,
    baseUrl: parsed.ADZUNA_BASE_URL,
    logLevel: parsed.ADZUNA_LOG_LEVEL ?? 'silent',
  };
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

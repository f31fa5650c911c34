import { type LevelWithSilent, type Logger, pino } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'silent';
const SERVICE_NAME = 'adzuna-client';
export const LOG_LEVELS = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
] as const satisfies readonly LevelWithSilent[];

export function isLogLevel(value: unknown): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(): LevelWithSilent {
  const raw = process.env.ADZUNA_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

/**
 * JSON logger used by the client when none is supplied.
 * Silent unless ADZUNA_LOG_LEVEL (or the `level` argument) says otherwise.
 */
export function createAdzunaLogger(level: LevelWithSilent = readLogLevel()): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}

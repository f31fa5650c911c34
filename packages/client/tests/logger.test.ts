import { afterEach, describe, expect, it, vi } from 'vitest';
import { createAdzunaLogger } from '../src/logger.js';

describe('createAdzunaLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('is silent by default', () => {
    vi.stubEnv('ADZUNA_LOG_LEVEL', '');

    expect(createAdzunaLogger().level).toBe('silent');
  });

  it('reads the level from ADZUNA_LOG_LEVEL', () => {
    vi.stubEnv('ADZUNA_LOG_LEVEL', ' Warn ');

    expect(createAdzunaLogger().level).toBe('warn');
  });

  it('falls back to silent for unknown levels', () => {
    vi.stubEnv('ADZUNA_LOG_LEVEL', 'verbose');

    expect(createAdzunaLogger().level).toBe('silent');
  });

  it('prefers an explicit level', () => {
    vi.stubEnv('ADZUNA_LOG_LEVEL', 'error');

    expect(createAdzunaLogger('debug').level).toBe('debug');
  });
});

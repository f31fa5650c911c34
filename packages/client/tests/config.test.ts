import { afterEach, describe, expect, it, vi } from 'vitest';
import { AdzunaClient } from '../src/client.js';
import { resolveClientOptions } from '../src/config.js';
import { requestedUrl, stubFetch } from './fetch-stub.js';

describe('client configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads and trims ADZUNA_* variables', () => {
    const options = resolveClientOptions({
      ADZUNA_APP_ID: ' test-id ',
      ADZUNA_APP_KEY: 'test-secret',
      ADZUNA_LOG_LEVEL: 'DEBUG',
      PATH: '/usr/bin',
    });

    expect(options).toEqual({
      appId: 'test-id',
      appKey: 'test-secret',
      baseUrl: undefined,
      logLevel: 'debug',
    });
  });

  it('keeps logging silent when the given record sets no level', () => {
    vi.stubEnv('ADZUNA_LOG_LEVEL', 'debug');

    const options = resolveClientOptions({ ADZUNA_APP_ID: 'test-id', ADZUNA_APP_KEY: 'test-secret' });

    expect(options.logLevel).toBe('silent');
  });

  it('names every missing credential', () => {
    expect(() => resolveClientOptions({})).toThrow('Invalid Adzuna client environment: ADZUNA_APP_ID, ADZUNA_APP_KEY');
  });

  it('treats blank values as unset', () => {
    expect(() => resolveClientOptions({ ADZUNA_APP_ID: 'test-id', ADZUNA_APP_KEY: '   ' })).toThrow(
      'Invalid Adzuna client environment: ADZUNA_APP_KEY',
    );
  });

  it('rejects a malformed base URL and log level', () => {
    expect(() =>
      resolveClientOptions({
        ADZUNA_APP_ID: 'test-id',
        ADZUNA_APP_KEY: 'test-secret',
        ADZUNA_BASE_URL: 'not a url',
        ADZUNA_LOG_LEVEL: 'verbose',
      }),
    ).toThrow('Invalid Adzuna client environment: ADZUNA_BASE_URL, ADZUNA_LOG_LEVEL');
  });

  it('builds a client from the environment', async () => {
    const fetchMock = stubFetch(200, { api_version: 1, software_version: '1.0.0' });
    const client = AdzunaClient.fromEnv(
      {
        ADZUNA_APP_ID: 'test-id',
        ADZUNA_APP_KEY: 'test-secret',
        ADZUNA_BASE_URL: 'http://localhost:9000/api',
      },
      { fetchImpl: fetchMock as unknown as typeof fetch },
    );

    await client.version().fetch();

    expect(requestedUrl(fetchMock).toString()).toBe('http://localhost:9000/api/version?app_id=test-id&app_key=test-secret');
  });
});

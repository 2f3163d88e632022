import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DEFAULTS } from '../core/defaults.js';
import { ValidationError } from '../error/validationError.js';
import { ScriptedTransport } from '../testing/scriptedTransport.js';
import { createClientFromEnv, loadConfigFromEnv } from './env.js';

describe('loadConfigFromEnv', () => {
  it('applies defaults for everything but the api key', async () => {
    const [err, config] = await loadConfigFromEnv({ ARTIFACT_API_KEY: 'test-key' });

    expect(err).toBeNull();
    expect(config).toEqual({
      apiKey: 'test-key',
      baseUrl: DEFAULTS.baseUrl,
      timeout: 30_000,
      retry: { maxRetries: 3, retryDelayMs: 1_000 },
    });
  });

  it('reads every variable', async () => {
    const [, config] = await loadConfigFromEnv({
      ARTIFACT_API_KEY: 'test-key',
      ARTIFACT_BASE_URL: 'https://artifacts.example.test/api',
      ARTIFACT_TIMEOUT: '5',
      ARTIFACT_MAX_RETRIES: '0',
      ARTIFACT_RETRY_DELAY: '250',
    });

    expect(config).toEqual({
      apiKey: 'test-key',
      baseUrl: 'https://artifacts.example.test/api',
      timeout: 5_000,
      retry: { maxRetries: 0, retryDelayMs: 250 },
    });
  });

  it('falls back to defaults for invalid or out of range values', async () => {
    const [, config] = await loadConfigFromEnv({
      ARTIFACT_API_KEY: 'test-key',
      ARTIFACT_BASE_URL: '',
      ARTIFACT_TIMEOUT: '0',
      ARTIFACT_MAX_RETRIES: '-1',
      ARTIFACT_RETRY_DELAY: 'soon',
    });

    expect(config?.baseUrl).toBe(DEFAULTS.baseUrl);
    expect(config?.timeout).toBe(30_000);
    expect(config?.retry).toEqual({ maxRetries: 3, retryDelayMs: 1_000 });
  });

  it('falls back to defaults for delays beyond the timer range', async () => {
    const [, config] = await loadConfigFromEnv({
      ARTIFACT_API_KEY: 'test-key',
      ARTIFACT_TIMEOUT: '2200000',
      ARTIFACT_RETRY_DELAY: '2147483648',
    });

    expect(config?.timeout).toBe(30_000);
    expect(config?.retry.retryDelayMs).toBe(1_000);
  });

  it('accepts the longest delays a timer can wait', async () => {
    const [, config] = await loadConfigFromEnv({
      ARTIFACT_API_KEY: 'test-key',
      ARTIFACT_TIMEOUT: '2147483',
      ARTIFACT_RETRY_DELAY: '2147483647',
    });

    expect(config?.timeout).toBe(2_147_483_000);
    expect(config?.retry.retryDelayMs).toBe(2_147_483_647);
  });

  it('rejects decimals and trailing garbage', async () => {
    const [, config] = await loadConfigFromEnv({
      ARTIFACT_API_KEY: 'test-key',
      ARTIFACT_TIMEOUT: '2.5',
      ARTIFACT_MAX_RETRIES: '5x',
    });

    expect(config?.timeout).toBe(30_000);
    expect(config?.retry.maxRetries).toBe(3);
  });

  it('ignores unrelated variables', async () => {
    const [, config] = await loadConfigFromEnv({ ARTIFACT_API_KEY: 'test-key', HOME: '/root' });

    expect(Object.keys(config ?? {})).toEqual(['apiKey', 'baseUrl', 'timeout', 'retry']);
  });

  it('fails without an api key', async () => {
    const [err, config] = await loadConfigFromEnv({ ARTIFACT_TIMEOUT: '5' });

    expect(config).toBeNull();
    expect(err?.message).toBe('error loading configuration from environment');
    expect(err?.cause).toBeInstanceOf(ValidationError);
    expect(err?.cause instanceof Error && err.cause.message).toBe(
      'error validating data; issues: ARTIFACT_API_KEY: ARTIFACT_API_KEY environment variable is required',
    );
  });

  it('fails with an empty api key', async () => {
    const [err] = await loadConfigFromEnv({ ARTIFACT_API_KEY: '' });

    expect(err?.message).toBe('error loading configuration from environment');
  });
});

describe('createClientFromEnv', () => {
  it('builds a client that uses the configuration', async () => {
    const transport = new ScriptedTransport([{ status: 200, body: { Defect: { ObjectID: 1 } } }]);

    const [err, client] = await createClientFromEnv(
      {
        ARTIFACT_API_KEY: 'test-key',
        ARTIFACT_BASE_URL: 'https://artifacts.example.test/api/',
        ARTIFACT_MAX_RETRIES: '1',
        ARTIFACT_RETRY_DELAY: '0',
      },
      transport,
    );

    expect(err).toBeNull();
    expect(client?.transport).toBe(transport);
    expect(client?.retryConfig).toEqual({ maxRetries: 1, retryDelayMs: 0 });

    await client?.get('defect', '1', z.unknown());

    expect(transport.requests[0]?.url).toBe('https://artifacts.example.test/api/defect/1?fetch=true');
    expect(transport.requests[0]?.headers.get('zsessionid')).toBe('test-key');
  });

  it('fails without an api key', async () => {
    const [err, client] = await createClientFromEnv({});

    expect(client).toBeNull();
    expect(err?.message).toBe('error creating client from environment');
    expect(err?.cause instanceof Error && err.cause.message).toBe('error loading configuration from environment');
  });
});

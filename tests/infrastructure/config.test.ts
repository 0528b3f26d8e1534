import { describe, it, expect } from 'vitest';
import { resolveConfig, warnOnKeyShape, DEFAULT_BASE_URL } from '../../src/infrastructure/config.js';
import { ConfigurationError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({ apiKey: 'bk_test-secret' }, {});

    expect(config).toEqual({
      apiKey: 'bk_test-secret',
      baseUrl: DEFAULT_BASE_URL,
      flushIntervalMs: 5000,
      batchSize: 100,
      timeoutMs: 10000,
      maxRetries: 3,
      retryBaseDelayMs: 500,
      retryMaxDelayMs: 30000,
      retryJitterMs: 250,
      closeTimeoutMs: 5000,
      maxEventBytes: 65536,
      logLevel: 'info',
    });
  });

  it('falls back to the environment', () => {
    const config = resolveConfig({}, {
      BEACON_API_KEY: 'bk_env-secret',
      BEACON_API_URL: 'http://localhost:4318/',
      BEACON_LOG_LEVEL: 'debug',
    });

    expect(config.apiKey).toBe('bk_env-secret');
    expect(config.baseUrl).toBe('http://localhost:4318');
    expect(config.logLevel).toBe('debug');
  });

  it('prefers explicit options over the environment', () => {
    const config = resolveConfig(
      { apiKey: 'bk_option-secret', baseUrl: 'https://collector.test' },
      { BEACON_API_KEY: 'bk_env-secret', BEACON_API_URL: 'http://localhost:4318' },
    );

    expect(config.apiKey).toBe('bk_option-secret');
    expect(config.baseUrl).toBe('https://collector.test');
  });

  it('requires a key', () => {
    expect(() => resolveConfig({}, {})).toThrow(ConfigurationError);
    expect(() => resolveConfig({ apiKey: '   ' }, {})).toThrow('API key is required. Pass apiKey or set BEACON_API_KEY.');
  });

  it('rejects a short key', () => {
    expect(() => resolveConfig({ apiKey: 'bk_1' }, {})).toThrow(
      'Invalid client configuration: apiKey: API key is too short',
    );
  });

  it('rejects a non-http base URL', () => {
    expect(() => resolveConfig({ apiKey: 'bk_test-secret', baseUrl: 'ftp://collector.test' }, {})).toThrow(
      'Invalid client configuration: baseUrl: Base URL must use http or https',
    );
  });

  it('lists every invalid option', () => {
    const error = (() => {
      try {
        resolveConfig({ apiKey: 'bk_test-secret', batchSize: 0, maxRetries: -1 }, {});
      } catch (err: unknown) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.issues.map((issue) => issue.split(':')[0])).toEqual([
      'batchSize',
      'maxRetries',
    ]);
  });

  it('rejects a retry ceiling below the base delay', () => {
    expect(() =>
      resolveConfig({ apiKey: 'bk_test-secret', retryBaseDelayMs: 1000, retryMaxDelayMs: 10 }, {}),
    ).toThrow('retryMaxDelayMs must be >= retryBaseDelayMs');
  });
});

describe('warnOnKeyShape', () => {
  it('warns when the key lacks the expected prefix', () => {
    const log = fakeLogger();

    warnOnKeyShape(resolveConfig({ apiKey: 'test-secret' }, {}), log);

    expect(log.warn).toHaveBeenCalledWith({ expectedPrefix: 'bk_' }, "API key should start with 'bk_'");
  });

  it('stays quiet for a well-formed key', () => {
    const log = fakeLogger();

    warnOnKeyShape(resolveConfig({ apiKey: 'bk_test-secret' }, {}), log);

    expect(log.warn).not.toHaveBeenCalled();
  });
});

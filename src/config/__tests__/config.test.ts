import { ConfigurationError } from '../../core/common/errors';
import { describeConfig, loadConfig } from '../index';

describe('loadConfig', () => {
  const env = { RECEIPT_SOURCE_DIR: '/receipts', TAGGUN_API_KEY: 'test-secret' };

  test('applies defaults', () => {
    const config = loadConfig(env);

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      sourceDir: '/receipts',
      ledgerFilename: 'records.csv',
      confidenceThreshold: 0.8,
      extraction: {
        apiKey: 'test-secret',
        baseUrl: 'https://api.taggun.io',
        timeoutMs: 60000,
        concurrency: 10,
        language: 'en',
      },
    });
  });

  test('reads values from the environment', () => {
    const config = loadConfig({
      ...env,
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      RECEIPT_CONFIDENCE_THRESHOLD: '0.6',
      TAGGUN_CONCURRENCY: '4',
      TAGGUN_TIMEOUT_MS: '5000',
      TAGGUN_BASE_URL: 'https://taggun.test',
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.logLevel).toBe('debug');
    expect(config.confidenceThreshold).toBe(0.6);
    expect(config.extraction.concurrency).toBe(4);
    expect(config.extraction.timeoutMs).toBe(5000);
    expect(config.extraction.baseUrl).toBe('https://taggun.test');
  });

  test('command-line overrides take precedence over the environment', () => {
    const config = loadConfig(
      { ...env, RECEIPT_CONFIDENCE_THRESHOLD: '0.6', TAGGUN_CONCURRENCY: '4' },
      { sourceDir: '/other', apiKey: 'override-secret', confidenceThreshold: 0.9, concurrency: 2, logLevel: 'warn' }
    );

    expect(config.sourceDir).toBe('/other');
    expect(config.extraction.apiKey).toBe('override-secret');
    expect(config.confidenceThreshold).toBe(0.9);
    expect(config.extraction.concurrency).toBe(2);
    expect(config.logLevel).toBe('warn');
  });

  test('falls back to KEY for the api key', () => {
    expect(loadConfig({ RECEIPT_SOURCE_DIR: '/receipts', KEY: 'test-secret' }).extraction.apiKey).toBe('test-secret');
  });

  test('requires a source directory and an api key', () => {
    expect(() => loadConfig({ TAGGUN_API_KEY: 'test-secret' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ RECEIPT_SOURCE_DIR: '/receipts' })).toThrow(ConfigurationError);
  });

  test('rejects out-of-range and malformed values', () => {
    expect(() => loadConfig(env, { confidenceThreshold: 1.5 })).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...env, RECEIPT_CONFIDENCE_THRESHOLD: 'high' })).toThrow(ConfigurationError);
    expect(() => loadConfig(env, { concurrency: 0 })).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...env, TAGGUN_CONCURRENCY: 'many' })).toThrow(ConfigurationError);
    expect(() => loadConfig(env, { logLevel: 'loud' })).toThrow('Invalid log level: loud');
  });

  test('returns a frozen configuration', () => {
    const config = loadConfig(env);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.extraction)).toBe(true);
  });
});

describe('describeConfig', () => {
  test('never includes the api key', () => {
    const lines = describeConfig(loadConfig({ RECEIPT_SOURCE_DIR: '/receipts', TAGGUN_API_KEY: 'test-secret' }));
    expect(lines).toContain('Source directory: /receipts');
    expect(lines.some(line => line.includes('test-secret'))).toBe(false);
  });
});

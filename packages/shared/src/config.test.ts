import { describe, it, expect } from 'vitest';
import { ConfigError, getConfig } from './config';

describe('getConfig', () => {
  it('falls back to dev defaults for an empty environment', () => {
    const config = getConfig({});

    expect(config.environment).toBe('dev');
    expect(config.http.port).toBe(8080);
    expect(config.http.trustProxyHops).toBe(0);
    expect(config.database).toEqual({
      driver: 'postgres',
      connectionString: undefined,
      host: undefined,
      port: undefined,
      database: undefined,
      user: undefined,
      password: undefined,
      ssl: false,
      secretArn: undefined
    });
    expect(config.jobs).toEqual({ maxRetries: 3, maxProcessingMs: 600_000 });
    expect(config.workers.idleMs).toBe(5_000);
    expect(config.extraction.maxInputChars).toBe(10_000);
    expect(config.rateLimit.windowMs).toBe(3_600_000);
  });

  it('selects per-environment defaults', () => {
    const prod = getConfig({ APP_ENV: 'prod' });

    expect(prod.environment).toBe('prod');
    expect(prod.workers.concurrency).toBe(4);
    expect(prod.database.ssl).toBe(true);
    expect(prod.extraction.attemptTimeoutMs).toBe(180_000);
  });

  it('lets variables override defaults and coerces numbers and flags', () => {
    const config = getConfig({
      APP_ENV: 'staging',
      WORKER_CONCURRENCY: '8',
      MAX_RETRIES: '0',
      TRUST_PROXY_HOPS: '1',
      EXTRACTION_REPAIR_JSON: '1',
      STORE_DRIVER: 'memory',
      DATABASE_URL: 'postgres://localhost:5432/rights',
      PINATA_JWT: 'test-secret'
    });

    expect(config.workers.concurrency).toBe(8);
    expect(config.http.trustProxyHops).toBe(1);
    expect(config.jobs.maxRetries).toBe(0);
    expect(config.extraction.repairJson).toBe(true);
    expect(config.database.driver).toBe('memory');
    expect(config.database.connectionString).toBe('postgres://localhost:5432/rights');
    expect(config.contentStore.pinataJwt).toBe('test-secret');
  });

  it('rejects malformed values with every offending variable listed', () => {
    let caught: unknown;
    try {
      getConfig({ APP_ENV: 'qa', WORKER_CONCURRENCY: 'many' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^APP_ENV: /);
    expect(issues[1]).toMatch(/^WORKER_CONCURRENCY: /);
  });
});

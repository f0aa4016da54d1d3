/**
 * Environment Configuration
 *
 * Typed runtime configuration for the API server and the worker pool, parsed from
 * environment variables with zod. Each deployment environment (dev, staging, prod)
 * has its own defaults; any variable that is set overrides the default.
 *
 * Variables are read once at startup by `getConfig()`. Nothing else in the code base
 * reads `process.env` for pipeline tuning, so tests build configs by passing a plain
 * object instead of mutating the process environment.
 */
import { z } from 'zod';

import type { Environment } from './index';

export interface AppConfig {
  /** Environment name (dev, staging, prod) */
  environment: Environment;

  /** HTTP server */
  http: {
    host: string;
    port: number;
    /** Directory where uploaded source documents are stored */
    uploadDir: string;
    /** Upload size ceiling in bytes */
    maxUploadBytes: number;
    /** How long `POST /api/parse?sync=true` waits for a terminal state */
    syncTimeoutMs: number;
    syncPollMs: number;
    /** Reverse proxies in front of the server whose X-Forwarded-For is trusted; 0 uses the socket address */
    trustProxyHops: number;
  };

  /** Job store backend */
  database: {
    driver: 'postgres' | 'memory';
    connectionString?: string;
    host?: string;
    port?: number;
    database?: string;
    user?: string;
    password?: string;
    ssl: boolean;
    /** AWS Secrets Manager secret holding `{ username, password }` */
    secretArn?: string;
  };

  /** Job-level retry and claim bounds */
  jobs: {
    /** Job-level retries before a retryable failure becomes terminal */
    maxRetries: number;
    /** A `processing` claim older than this is eligible for recovery */
    maxProcessingMs: number;
  };

  workers: {
    concurrency: number;
    /** Idle wait after a claim attempt finds no pending job */
    idleMs: number;
    /** Interval of the stale-claim sweep */
    staleSweepMs: number;
    /** Converted text shorter than this is rejected as unreadable */
    minTextLength: number;
  };

  extraction: {
    /** Engine calls per job attempt */
    maxAttempts: number;
    attemptTimeoutMs: number;
    /** Delay before the second attempt; grows linearly */
    backoffMs: number;
    /** Source text is truncated to this many characters before prompting */
    maxInputChars: number;
    /** Run engine output through jsonrepair before parsing */
    repairJson: boolean;
  };

  contentStore: {
    /** Local IPFS node HTTP API */
    ipfsApiUrl: string;
    /** Pinata JWT; when set, artifacts are pinned through Pinata instead of the local node */
    pinataJwt?: string;
    timeoutMs: number;
  };

  webhooks: {
    maxAttempts: number;
    timeoutMs: number;
    /** First backoff delay; doubles per attempt */
    baseDelayMs: number;
  };

  rateLimit: {
    /** Rolling window length */
    windowMs: number;
  };
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const flag = z.enum(['0', '1', 'true', 'false']).transform(v => v === '1' || v === 'true');

const EnvSchema = z.object({
  APP_ENV: z.enum(['dev', 'staging', 'prod']).default('dev'),
  HOST: z.string().min(1).optional(),
  PORT: positiveInt.optional(),
  UPLOAD_DIR: z.string().min(1).optional(),
  MAX_UPLOAD_BYTES: positiveInt.optional(),
  SYNC_TIMEOUT_MS: positiveInt.optional(),
  SYNC_POLL_MS: positiveInt.optional(),
  TRUST_PROXY_HOPS: nonNegativeInt.optional(),

  STORE_DRIVER: z.enum(['postgres', 'memory']).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().min(1).optional(),
  DB_PORT: positiveInt.optional(),
  DB_NAME: z.string().min(1).optional(),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().min(1).optional(),
  DB_SSL: flag.optional(),
  DATABASE_SECRET_ARN: z.string().min(1).optional(),

  MAX_RETRIES: nonNegativeInt.optional(),
  MAX_PROCESSING_MS: positiveInt.optional(),

  WORKER_CONCURRENCY: positiveInt.optional(),
  WORKER_IDLE_MS: positiveInt.optional(),
  STALE_SWEEP_MS: positiveInt.optional(),
  MIN_TEXT_LENGTH: nonNegativeInt.optional(),

  EXTRACTION_MAX_ATTEMPTS: positiveInt.optional(),
  EXTRACTION_TIMEOUT_MS: positiveInt.optional(),
  EXTRACTION_BACKOFF_MS: nonNegativeInt.optional(),
  EXTRACTION_MAX_INPUT_CHARS: positiveInt.optional(),
  EXTRACTION_REPAIR_JSON: flag.optional(),

  IPFS_API_URL: z.string().url().optional(),
  PINATA_JWT: z.string().min(1).optional(),
  CONTENT_STORE_TIMEOUT_MS: positiveInt.optional(),

  WEBHOOK_MAX_ATTEMPTS: positiveInt.optional(),
  WEBHOOK_TIMEOUT_MS: positiveInt.optional(),
  WEBHOOK_BASE_DELAY_MS: nonNegativeInt.optional(),

  RATE_LIMIT_WINDOW_MS: positiveInt.optional()
});

type Defaults = Omit<AppConfig, 'environment'>;

const DEV_DEFAULTS: Defaults = {
  http: {
    host: '0.0.0.0',
    port: 8080,
    uploadDir: './uploads',
    maxUploadBytes: 25 * 1024 * 1024,
    syncTimeoutMs: 120_000,
    syncPollMs: 500,
    trustProxyHops: 0
  },
  database: { driver: 'postgres', ssl: false },
  jobs: { maxRetries: 3, maxProcessingMs: 10 * 60_000 },
  workers: { concurrency: 1, idleMs: 5_000, staleSweepMs: 60_000, minTextLength: 50 },
  extraction: {
    maxAttempts: 3,
    attemptTimeoutMs: 120_000,
    backoffMs: 1_000,
    maxInputChars: 10_000,
    repairJson: false
  },
  contentStore: { ipfsApiUrl: 'http://localhost:5001', timeoutMs: 30_000 },
  webhooks: { maxAttempts: 5, timeoutMs: 10_000, baseDelayMs: 1_000 },
  rateLimit: { windowMs: 60 * 60_000 }
};

function defaultsFor(environment: Environment): Defaults {
  switch (environment) {
    case 'dev':
      return DEV_DEFAULTS;
    case 'staging':
      // Production-like, smaller pool
      return {
        ...DEV_DEFAULTS,
        database: { driver: 'postgres', ssl: true },
        workers: { ...DEV_DEFAULTS.workers, concurrency: 2 }
      };
    case 'prod':
      return {
        ...DEV_DEFAULTS,
        database: { driver: 'postgres', ssl: true },
        workers: { ...DEV_DEFAULTS.workers, concurrency: 4, staleSweepMs: 30_000 },
        extraction: { ...DEV_DEFAULTS.extraction, attemptTimeoutMs: 180_000 }
      };
  }
}

/**
 * Build the runtime configuration from environment variables.
 *
 * @param env - Variable source; defaults to `process.env`
 * @throws {ConfigError} When a variable is present but malformed
 *
 * @example
 * ```typescript
 * const config = getConfig({ APP_ENV: 'prod', WORKER_CONCURRENCY: '8' });
 * config.workers.concurrency; // 8
 * ```
 */
export function getConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  const base = defaultsFor(e.APP_ENV);

  return {
    environment: e.APP_ENV,
    http: {
      host: e.HOST ?? base.http.host,
      port: e.PORT ?? base.http.port,
      uploadDir: e.UPLOAD_DIR ?? base.http.uploadDir,
      maxUploadBytes: e.MAX_UPLOAD_BYTES ?? base.http.maxUploadBytes,
      syncTimeoutMs: e.SYNC_TIMEOUT_MS ?? base.http.syncTimeoutMs,
      syncPollMs: e.SYNC_POLL_MS ?? base.http.syncPollMs,
      trustProxyHops: e.TRUST_PROXY_HOPS ?? base.http.trustProxyHops
    },
    database: {
      driver: e.STORE_DRIVER ?? base.database.driver,
      connectionString: e.DATABASE_URL,
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      ssl: e.DB_SSL ?? base.database.ssl,
      secretArn: e.DATABASE_SECRET_ARN
    },
    jobs: {
      maxRetries: e.MAX_RETRIES ?? base.jobs.maxRetries,
      maxProcessingMs: e.MAX_PROCESSING_MS ?? base.jobs.maxProcessingMs
    },
    workers: {
      concurrency: e.WORKER_CONCURRENCY ?? base.workers.concurrency,
      idleMs: e.WORKER_IDLE_MS ?? base.workers.idleMs,
      staleSweepMs: e.STALE_SWEEP_MS ?? base.workers.staleSweepMs,
      minTextLength: e.MIN_TEXT_LENGTH ?? base.workers.minTextLength
    },
    extraction: {
      maxAttempts: e.EXTRACTION_MAX_ATTEMPTS ?? base.extraction.maxAttempts,
      attemptTimeoutMs: e.EXTRACTION_TIMEOUT_MS ?? base.extraction.attemptTimeoutMs,
      backoffMs: e.EXTRACTION_BACKOFF_MS ?? base.extraction.backoffMs,
      maxInputChars: e.EXTRACTION_MAX_INPUT_CHARS ?? base.extraction.maxInputChars,
      repairJson: e.EXTRACTION_REPAIR_JSON ?? base.extraction.repairJson
    },
    contentStore: {
      ipfsApiUrl: e.IPFS_API_URL ?? base.contentStore.ipfsApiUrl,
      pinataJwt: e.PINATA_JWT,
      timeoutMs: e.CONTENT_STORE_TIMEOUT_MS ?? base.contentStore.timeoutMs
    },
    webhooks: {
      maxAttempts: e.WEBHOOK_MAX_ATTEMPTS ?? base.webhooks.maxAttempts,
      timeoutMs: e.WEBHOOK_TIMEOUT_MS ?? base.webhooks.timeoutMs,
      baseDelayMs: e.WEBHOOK_BASE_DELAY_MS ?? base.webhooks.baseDelayMs
    },
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS ?? base.rateLimit.windowMs
    }
  };
}

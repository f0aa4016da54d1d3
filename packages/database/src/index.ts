/**
 * Rights Parser - Database Package Entry Point
 *
 * Persistence layer for the agreement extraction pipeline. Three stores sit behind
 * one client interface:
 *
 * - Job store: the job state machine (pending → processing → completed | failed),
 *   atomic single-winner claims and stale-claim recovery
 * - API key store: key lookup and the rolling-window quota check-and-increment
 * - Usage log store: append-only per-request audit rows
 *
 * Two implementations share the rules in `stateMachine.ts`: `DatabaseClient`
 * (PostgreSQL via node-postgres) and `MemoryDatabaseClient` (single process, used
 * by tests and `STORE_DRIVER=memory`).
 */

import { Pool, type PoolClient } from 'pg';

import { createLogger, errorMessage } from '@rights-parser/shared';

import { ClaimLostError, JobNotFoundError } from './errors';
import type { ApiKey, CreateApiKeyParams, QuotaDecision } from './models/apiKey';
import { DEFAULT_RATE_LIMIT, evaluateQuota } from './models/apiKey';
import type { CreateJobParams, Job, JobCompletion, JobStatus, ListJobsOptions } from './models/job';
import { isJobStatus } from './models/job';
import type { NewUsageLog, UsageLog } from './models/usageLog';
import { DEFAULT_MAX_RETRIES, STALE_CLAIM_MESSAGE, assertCompletion, assertOwnedTransition } from './stateMachine';

export const DATABASE_VERSION = '2.0.0';

const log = createLogger('database');

/**
 * Database connection configuration supporting both connection string and discrete parameters.
 */
export interface DatabaseClientConfig {
  /** Complete PostgreSQL connection string (preferred for production) */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** Enable SSL connections (default: true) */
  ssl?: boolean;
  /** Job-level retry bound applied by `failJob` and `recoverStaleJobs` */
  maxRetries?: number;
}

export interface IJobStore {
  /** Create a job in `pending`. */
  createJob(params: CreateJobParams): Promise<Job>;
  getJobById(id: string): Promise<Job | null>;
  /** Caller's jobs, newest first. */
  listJobsByApiKey(apiKeyHash: string, options?: ListJobsOptions): Promise<Job[]>;
  /**
   * Atomically take the oldest pending job for `workerId`.
   * Concurrent callers never receive the same job; `null` when nothing is pending.
   */
  claimJob(workerId: string): Promise<Job | null>;
  /**
   * processing → completed. Only the worker holding the claim may complete.
   * @throws {InvalidTransitionError} job is not processing
   * @throws {ClaimLostError} job is processing under another worker
   */
  completeJob(jobId: string, workerId: string, result: JobCompletion): Promise<Job>;
  /**
   * processing → pending (retryable and retries left, `retryCount + 1`) or processing → failed.
   */
  failJob(jobId: string, workerId: string, errorMessage: string, retryable: boolean): Promise<Job>;
  /**
   * Release claims held longer than `maxProcessingMs`, treating each as a retryable
   * failure. Returns the released jobs in their new state.
   */
  recoverStaleJobs(maxProcessingMs: number): Promise<Job[]>;
  /** Set `webhookSent`. Resolves true only for the call that flipped the flag. */
  markWebhookSent(jobId: string): Promise<boolean>;
}

export interface IApiKeyStore {
  createApiKey(params: CreateApiKeyParams): Promise<ApiKey>;
  findApiKeyByHash(keyHash: string): Promise<ApiKey | null>;
  /**
   * Check the key's rolling window and, when under its limit, record the request,
   * bump `requestsCount` and stamp `lastUsedAt`, all as one exclusive step.
   * `null` when no key has this hash.
   */
  consumeApiKeyQuota(keyHash: string, windowMs: number): Promise<QuotaDecision | null>;
}

export interface IUsageLogStore {
  appendUsageLog(entry: NewUsageLog): Promise<UsageLog>;
  listUsageLogs(options?: { apiKeyHash?: string; limit?: number }): Promise<UsageLog[]>;
}

/**
 * Everything the API server and worker pool need from persistence.
 */
export interface IDatabaseClient extends IJobStore, IApiKeyStore, IUsageLogStore {
  /** Connection lifecycle management */
  end(): Promise<void>;
  /** Database connectivity health check */
  healthCheck(): Promise<boolean>;
}

// ===== ROW SHAPES =====

interface JobRow {
  id: string;
  file_name: string;
  file_path: string;
  file_size: string | number;
  api_key_hash: string;
  user_id: string | null;
  status: string;
  ipfs_cid: string | null;
  encryption_key: string | null;
  parsed_json: unknown;
  error_message: string | null;
  retry_count: number;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  processing_time_ms: string | number | null;
  model_used: string | null;
  webhook_url: string | null;
  webhook_sent: boolean;
  claimed_by: string | null;
  updated_at: Date;
}

interface ApiKeyRow {
  id: string;
  key_hash: string;
  key_prefix: string;
  name: string | null;
  user_id: string | null;
  organization: string | null;
  is_active: boolean;
  expires_at: Date | null;
  rate_limit: number;
  requests_count: string | number;
  last_used_at: Date | null;
  created_at: Date;
}

interface UsageLogRow {
  id: string;
  job_id: string | null;
  api_key_hash: string | null;
  endpoint: string;
  method: string;
  status_code: number;
  processing_time_ms: string | number;
  file_size: string | number | null;
  ip_address: string | null;
  user_agent: string | null;
  created_at: Date;
}

const JOB_COLUMNS = `id, file_name, file_path, file_size, api_key_hash, user_id, status, ipfs_cid, encryption_key,
  parsed_json, error_message, retry_count, created_at, started_at, completed_at, processing_time_ms, model_used,
  webhook_url, webhook_sent, claimed_by, updated_at`;

const API_KEY_COLUMNS = `id, key_hash, key_prefix, name, user_id, organization, is_active, expires_at, rate_limit,
  requests_count, last_used_at, created_at`;

const USAGE_LOG_COLUMNS = `id, job_id, api_key_hash, endpoint, method, status_code, processing_time_ms, file_size,
  ip_address, user_agent, created_at`;

/** Milliseconds between `started_at` and NOW(), as stored in `processing_time_ms`. */
const ELAPSED_MS_SQL = `(EXTRACT(EPOCH FROM (NOW() - started_at)) * 1000)::BIGINT`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumberOrNull(value: string | number | null): number | null {
  return value === null ? null : Number(value);
}

/**
 * Concrete implementation of the database client using node-postgres (pg) connection pooling.
 *
 * Claims are a single conditional UPDATE whose candidate row is chosen with
 * `FOR UPDATE SKIP LOCKED`; complete and fail are conditional on the job still being
 * `processing` under the writing worker. No external lock is involved, so several
 * processes may share one database.
 */
export class DatabaseClient implements IDatabaseClient {
  private readonly pool: Pool;
  private readonly maxRetries: number;

  /**
   * Prefers connection string for production, supports discrete parameters for development.
   */
  constructor(config?: DatabaseClientConfig) {
    this.maxRetries = config?.maxRetries ?? DEFAULT_MAX_RETRIES;
    const connectionString = config?.connectionString;
    this.pool = new Pool(
      connectionString
        ? {
            connectionString,
            ssl: config?.ssl ?? true,
            max: 10,
            idleTimeoutMillis: 30000, // Close idle connections after 30s
            connectionTimeoutMillis: 5000 // Timeout for acquiring connection
          }
        : {
            host: config?.host,
            port: config?.port,
            database: config?.database,
            user: config?.user,
            password: config?.password,
            ssl: config?.ssl ?? true,
            max: 10,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000
          }
    );
  }

  /**
   * Gracefully close all database connections in the pool.
   *
   * NOTE: When using getSharedDatabaseClient(), only the process shutdown path should
   * call this; every other caller shares the pool.
   */
  async end(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Executes a lightweight `SELECT 1` to verify the pool can reach the database.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.pool.query('SELECT 1');
      return result.rowCount === 1;
    } catch {
      return false;
    }
  }

  // ===== JOB MANAGEMENT OPERATIONS =====

  async createJob(params: CreateJobParams): Promise<Job> {
    const query = `
      INSERT INTO jobs (file_name, file_path, file_size, api_key_hash, user_id, webhook_url)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING ${JOB_COLUMNS}
    `;
    const result = await this.pool.query<JobRow>(query, [
      params.fileName,
      params.filePath,
      params.fileSize,
      params.apiKeyHash,
      params.userId ?? null,
      params.webhookUrl ?? null
    ]);
    return this.mapJob(this.firstRow(result.rows, 'INSERT INTO jobs'));
  }

  async getJobById(id: string): Promise<Job | null> {
    const query = `SELECT ${JOB_COLUMNS} FROM jobs WHERE id = $1`;
    const result = await this.pool.query<JobRow>(query, [id]);
    const row = result.rows[0];
    return row ? this.mapJob(row) : null;
  }

  async listJobsByApiKey(apiKeyHash: string, options?: ListJobsOptions): Promise<Job[]> {
    const conditions: string[] = ['api_key_hash = $1'];
    const values: (string | number)[] = [apiKeyHash];
    if (options?.status) {
      values.push(options.status);
      conditions.push(`status = $${values.length}`);
    }
    values.push(options?.limit ?? 50);

    const query = `
      SELECT ${JOB_COLUMNS}
      FROM jobs
      WHERE ${conditions.join(' AND ')}
      ORDER BY created_at DESC
      LIMIT $${values.length}
    `;
    const result = await this.pool.query<JobRow>(query, values);
    return result.rows.map(row => this.mapJob(row));
  }

  async claimJob(workerId: string): Promise<Job | null> {
    // The outer status check makes the UPDATE a no-op if another transaction
    // moved the candidate between the subselect and the write.
    const query = `
      UPDATE jobs
      SET status = 'processing', started_at = NOW(), claimed_by = $1, completed_at = NULL, updated_at = NOW()
      WHERE id = (
        SELECT id FROM jobs
        WHERE status = 'pending'
        ORDER BY created_at
        LIMIT 1
        FOR UPDATE SKIP LOCKED
      )
      AND status = 'pending'
      RETURNING ${JOB_COLUMNS}
    `;
    const result = await this.pool.query<JobRow>(query, [workerId]);
    const row = result.rows[0];
    return row ? this.mapJob(row) : null;
  }

  async completeJob(jobId: string, workerId: string, result: JobCompletion): Promise<Job> {
    assertCompletion(jobId, result);
    const query = `
      UPDATE jobs
      SET status = 'completed',
          ipfs_cid = $3,
          encryption_key = $4,
          parsed_json = $5,
          model_used = COALESCE($6, model_used),
          error_message = NULL,
          completed_at = NOW(),
          processing_time_ms = ${ELAPSED_MS_SQL},
          claimed_by = NULL,
          updated_at = NOW()
      WHERE id = $1 AND status = 'processing' AND claimed_by = $2
      RETURNING ${JOB_COLUMNS}
    `;
    const updated = await this.pool.query<JobRow>(query, [
      jobId,
      workerId,
      result.ipfsCid,
      result.encryptionKey,
      JSON.stringify(result.parsedJson),
      result.modelUsed ?? null
    ]);
    const row = updated.rows[0];
    if (!row) {
      return this.rejectWrite(jobId, workerId, 'completed');
    }
    return this.mapJob(row);
  }

  async failJob(jobId: string, workerId: string, errorMessage: string, retryable: boolean): Promise<Job> {
    // Every right-hand side reads the pre-update row, so the CASE arms agree.
    const retry = `($4::boolean AND retry_count < $5::int)`;
    const query = `
      UPDATE jobs
      SET status = CASE WHEN ${retry} THEN 'pending' ELSE 'failed' END,
          retry_count = CASE WHEN ${retry} THEN retry_count + 1 ELSE retry_count END,
          error_message = $3,
          completed_at = CASE WHEN ${retry} THEN NULL ELSE NOW() END,
          processing_time_ms = CASE WHEN ${retry} THEN NULL ELSE ${ELAPSED_MS_SQL} END,
          claimed_by = NULL,
          updated_at = NOW()
      WHERE id = $1 AND status = 'processing' AND claimed_by = $2
      RETURNING ${JOB_COLUMNS}
    `;
    const updated = await this.pool.query<JobRow>(query, [jobId, workerId, errorMessage, retryable, this.maxRetries]);
    const row = updated.rows[0];
    if (!row) {
      return this.rejectWrite(jobId, workerId, 'failed');
    }
    return this.mapJob(row);
  }

  async recoverStaleJobs(maxProcessingMs: number): Promise<Job[]> {
    const retry = `(retry_count < $2::int)`;
    const query = `
      UPDATE jobs
      SET status = CASE WHEN ${retry} THEN 'pending' ELSE 'failed' END,
          retry_count = CASE WHEN ${retry} THEN retry_count + 1 ELSE retry_count END,
          error_message = $3,
          completed_at = CASE WHEN ${retry} THEN NULL ELSE NOW() END,
          processing_time_ms = CASE WHEN ${retry} THEN NULL ELSE ${ELAPSED_MS_SQL} END,
          claimed_by = NULL,
          updated_at = NOW()
      WHERE status = 'processing' AND started_at < NOW() - ($1::bigint * INTERVAL '1 millisecond')
      RETURNING ${JOB_COLUMNS}
    `;
    const result = await this.pool.query<JobRow>(query, [maxProcessingMs, this.maxRetries, STALE_CLAIM_MESSAGE]);
    return result.rows.map(row => this.mapJob(row));
  }

  async markWebhookSent(jobId: string): Promise<boolean> {
    const query = `
      UPDATE jobs
      SET webhook_sent = TRUE, updated_at = NOW()
      WHERE id = $1 AND webhook_sent = FALSE
    `;
    const result = await this.pool.query(query, [jobId]);
    return result.rowCount === 1;
  }

  // ===== API KEY OPERATIONS =====

  async createApiKey(params: CreateApiKeyParams): Promise<ApiKey> {
    const query = `
      INSERT INTO api_keys (key_hash, key_prefix, name, user_id, organization, is_active, expires_at, rate_limit)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${API_KEY_COLUMNS}
    `;
    const result = await this.pool.query<ApiKeyRow>(query, [
      params.keyHash,
      params.keyPrefix,
      params.name ?? null,
      params.userId ?? null,
      params.organization ?? null,
      params.isActive ?? true,
      params.expiresAt ?? null,
      params.rateLimit ?? DEFAULT_RATE_LIMIT
    ]);
    return this.mapApiKey(this.firstRow(result.rows, 'INSERT INTO api_keys'));
  }

  async findApiKeyByHash(keyHash: string): Promise<ApiKey | null> {
    const query = `SELECT ${API_KEY_COLUMNS} FROM api_keys WHERE key_hash = $1`;
    const result = await this.pool.query<ApiKeyRow>(query, [keyHash]);
    const row = result.rows[0];
    return row ? this.mapApiKey(row) : null;
  }

  /**
   * Rolling-window check-and-increment.
   *
   * The key row is locked `FOR UPDATE` for the whole transaction, so concurrent
   * requests on one key are serialized and cannot both take the last slot.
   * NOW() is fixed at transaction start, so the count, the decision and the
   * inserted timestamp all refer to the same instant.
   */
  async consumeApiKeyQuota(keyHash: string, windowMs: number): Promise<QuotaDecision | null> {
    return this.transaction(async client => {
      const keyResult = await client.query<{ id: string; rate_limit: number }>(
        'SELECT id, rate_limit FROM api_keys WHERE key_hash = $1 FOR UPDATE',
        [keyHash]
      );
      const key = keyResult.rows[0];
      if (!key) return null;

      const windowResult = await client.query<{ now: Date; used: number; oldest: Date | null }>(
        `
        SELECT NOW() AS now, COUNT(*)::int AS used, MIN(requested_at) AS oldest
        FROM api_key_requests
        WHERE api_key_id = $1 AND requested_at > NOW() - ($2::bigint * INTERVAL '1 millisecond')
        `,
        [key.id, windowMs]
      );
      const window = this.firstRow(windowResult.rows, 'api_key_requests window');

      const decision = evaluateQuota({
        limit: key.rate_limit,
        used: window.used,
        oldest: window.oldest,
        now: window.now,
        windowMs
      });
      if (!decision.allowed) return decision;

      await client.query('INSERT INTO api_key_requests (api_key_id, requested_at) VALUES ($1, NOW())', [key.id]);
      await client.query(
        'UPDATE api_keys SET requests_count = requests_count + 1, last_used_at = NOW() WHERE id = $1',
        [key.id]
      );
      // Rows outside the window no longer affect any decision
      await client.query(
        `DELETE FROM api_key_requests
         WHERE api_key_id = $1 AND requested_at <= NOW() - ($2::bigint * INTERVAL '1 millisecond')`,
        [key.id, windowMs]
      );
      return decision;
    });
  }

  // ===== USAGE LOG OPERATIONS =====

  async appendUsageLog(entry: NewUsageLog): Promise<UsageLog> {
    const query = `
      INSERT INTO usage_logs (job_id, api_key_hash, endpoint, method, status_code, processing_time_ms, file_size,
        ip_address, user_agent)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${USAGE_LOG_COLUMNS}
    `;
    const result = await this.pool.query<UsageLogRow>(query, [
      entry.jobId,
      entry.apiKeyHash,
      entry.endpoint,
      entry.method,
      entry.statusCode,
      Math.trunc(entry.processingTimeMs),
      entry.fileSize,
      entry.ipAddress,
      entry.userAgent
    ]);
    return this.mapUsageLog(this.firstRow(result.rows, 'INSERT INTO usage_logs'));
  }

  async listUsageLogs(options?: { apiKeyHash?: string; limit?: number }): Promise<UsageLog[]> {
    const values: (string | number)[] = [];
    let where = '';
    if (options?.apiKeyHash) {
      values.push(options.apiKeyHash);
      where = 'WHERE api_key_hash = $1';
    }
    values.push(options?.limit ?? 100);
    const query = `
      SELECT ${USAGE_LOG_COLUMNS}
      FROM usage_logs
      ${where}
      ORDER BY created_at DESC
      LIMIT $${values.length}
    `;
    const result = await this.pool.query<UsageLogRow>(query, values);
    return result.rows.map(row => this.mapUsageLog(row));
  }

  // ===== PRIVATE UTILITIES =====

  private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    // Set when the connection is broken and must be discarded rather than pooled
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const value = await fn(client);
      await client.query('COMMIT');
      return value;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        broken = rollbackErr instanceof Error ? rollbackErr : new Error(errorMessage(rollbackErr));
        log.error('Rollback failed; discarding connection', { error: broken.message, cause: errorMessage(err) });
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }

  /**
   * A conditional write matched no row. Re-read the job to report why.
   */
  private async rejectWrite(jobId: string, workerId: string, to: JobStatus): Promise<never> {
    const job = await this.getJobById(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    assertOwnedTransition(job, workerId, to);
    // Legal and owned on re-read: the claim moved between the write and the read
    throw new ClaimLostError(jobId, workerId, job.claimedBy);
  }

  private firstRow<T>(rows: T[], context: string): T {
    const row = rows[0];
    if (!row) {
      throw new Error(`${context}: query returned no rows`);
    }
    return row;
  }

  /**
   * Map a `jobs` row to the Job interface (snake_case → camelCase, BIGINT strings → numbers).
   */
  private mapJob(row: JobRow): Job {
    if (!isJobStatus(row.status)) {
      throw new Error(`Job ${row.id} has unknown status "${row.status}"`);
    }
    return {
      id: row.id,
      fileName: row.file_name,
      filePath: row.file_path,
      fileSize: Number(row.file_size),
      apiKeyHash: row.api_key_hash,
      userId: row.user_id,
      status: row.status,
      ipfsCid: row.ipfs_cid,
      encryptionKey: row.encryption_key,
      parsedJson: isRecord(row.parsed_json) ? row.parsed_json : null,
      errorMessage: row.error_message,
      retryCount: row.retry_count,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      processingTimeMs: toNumberOrNull(row.processing_time_ms),
      modelUsed: row.model_used,
      webhookUrl: row.webhook_url,
      webhookSent: row.webhook_sent,
      claimedBy: row.claimed_by,
      updatedAt: new Date(row.updated_at)
    };
  }

  private mapApiKey(row: ApiKeyRow): ApiKey {
    return {
      id: row.id,
      keyHash: row.key_hash,
      keyPrefix: row.key_prefix,
      name: row.name,
      userId: row.user_id,
      organization: row.organization,
      isActive: row.is_active,
      expiresAt: row.expires_at ? new Date(row.expires_at) : null,
      rateLimit: row.rate_limit,
      requestsCount: Number(row.requests_count),
      lastUsedAt: row.last_used_at ? new Date(row.last_used_at) : null,
      createdAt: new Date(row.created_at)
    };
  }

  private mapUsageLog(row: UsageLogRow): UsageLog {
    return {
      id: row.id,
      jobId: row.job_id,
      apiKeyHash: row.api_key_hash,
      endpoint: row.endpoint,
      method: row.method,
      statusCode: row.status_code,
      processingTimeMs: Number(row.processing_time_ms),
      fileSize: toNumberOrNull(row.file_size),
      ipAddress: row.ip_address,
      userAgent: row.user_agent,
      createdAt: new Date(row.created_at)
    };
  }
}

export * from './models/job';
export * from './models/apiKey';
export * from './models/usageLog';
export * from './errors';
export * from './stateMachine';
export * from './memory';
export * from './shared-client';
export * from './credentials';
export * from './migrate';
export * from './schema';
export * from './repositories/jobRepository';

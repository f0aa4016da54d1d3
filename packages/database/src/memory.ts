/**
 * In-process implementation of the database client.
 *
 * Used by the test suites and by `STORE_DRIVER=memory` for local runs without
 * PostgreSQL. Every operation does its read-check-write without an `await` in
 * between, which gives it the same exclusivity the SQL client gets from row locks:
 * two concurrent `claimJob` calls can never observe the same pending job.
 *
 * Returned entities are copies; mutating them does not touch stored state.
 */
import { randomUUID } from 'node:crypto';

import type { IDatabaseClient } from './index';
import { JobNotFoundError } from './errors';
import type { ApiKey, CreateApiKeyParams, QuotaDecision } from './models/apiKey';
import { DEFAULT_RATE_LIMIT, evaluateQuota } from './models/apiKey';
import type { CreateJobParams, Job, JobCompletion, ListJobsOptions } from './models/job';
import type { NewUsageLog, UsageLog } from './models/usageLog';
import {
  DEFAULT_MAX_RETRIES,
  STALE_CLAIM_MESSAGE,
  assertCompletion,
  assertOwnedTransition,
  processingTime,
  resolveFailure
} from './stateMachine';

export interface MemoryDatabaseClientOptions {
  maxRetries?: number;
  /** Time source; tests pass a controllable clock */
  now?: () => Date;
}

export class MemoryDatabaseClient implements IDatabaseClient {
  private readonly jobs = new Map<string, Job>();
  private readonly apiKeys = new Map<string, ApiKey>();
  /** Admitted request times per api key id, oldest first */
  private readonly admitted = new Map<string, number[]>();
  private readonly usageLogs: UsageLog[] = [];
  private readonly maxRetries: number;
  private readonly now: () => Date;
  /** Insertion counter; breaks createdAt ties so claim order is FIFO */
  private sequence = 0;
  private readonly order = new Map<string, number>();

  constructor(options: MemoryDatabaseClientOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.now = options.now ?? (() => new Date());
  }

  async end(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  // ===== JOBS =====

  async createJob(params: CreateJobParams): Promise<Job> {
    const now = this.now();
    const job: Job = {
      id: randomUUID(),
      fileName: params.fileName,
      filePath: params.filePath,
      fileSize: params.fileSize,
      apiKeyHash: params.apiKeyHash,
      userId: params.userId ?? null,
      status: 'pending',
      ipfsCid: null,
      encryptionKey: null,
      parsedJson: null,
      errorMessage: null,
      retryCount: 0,
      createdAt: now,
      startedAt: null,
      completedAt: null,
      processingTimeMs: null,
      modelUsed: null,
      webhookUrl: params.webhookUrl ?? null,
      webhookSent: false,
      claimedBy: null,
      updatedAt: now
    };
    this.jobs.set(job.id, job);
    this.order.set(job.id, this.sequence++);
    return structuredClone(job);
  }

  async getJobById(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async listJobsByApiKey(apiKeyHash: string, options?: ListJobsOptions): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter(job => job.apiKeyHash === apiKeyHash && (!options?.status || job.status === options.status))
      .sort((a, b) => this.seq(b) - this.seq(a))
      .slice(0, options?.limit ?? 50)
      .map(job => structuredClone(job));
  }

  async claimJob(workerId: string): Promise<Job | null> {
    let candidate: Job | undefined;
    for (const job of this.jobs.values()) {
      if (job.status !== 'pending') continue;
      if (!candidate || this.seq(job) < this.seq(candidate)) candidate = job;
    }
    if (!candidate) return null;

    const now = this.now();
    candidate.status = 'processing';
    candidate.startedAt = now;
    candidate.completedAt = null;
    candidate.claimedBy = workerId;
    candidate.updatedAt = now;
    return structuredClone(candidate);
  }

  async completeJob(jobId: string, workerId: string, result: JobCompletion): Promise<Job> {
    assertCompletion(jobId, result);
    const job = this.requireJob(jobId);
    assertOwnedTransition(job, workerId, 'completed');

    const now = this.now();
    job.status = 'completed';
    job.ipfsCid = result.ipfsCid;
    job.encryptionKey = result.encryptionKey;
    job.parsedJson = structuredClone(result.parsedJson);
    job.modelUsed = result.modelUsed ?? job.modelUsed;
    job.errorMessage = null;
    job.completedAt = now;
    job.processingTimeMs = processingTime(job.startedAt, now);
    job.claimedBy = null;
    job.updatedAt = now;
    return structuredClone(job);
  }

  async failJob(jobId: string, workerId: string, errorMessage: string, retryable: boolean): Promise<Job> {
    const job = this.requireJob(jobId);
    const outcome = resolveFailure(job.retryCount, retryable, this.maxRetries);
    assertOwnedTransition(job, workerId, outcome.status);
    this.applyFailure(job, errorMessage, outcome.status, outcome.retryCount);
    return structuredClone(job);
  }

  async recoverStaleJobs(maxProcessingMs: number): Promise<Job[]> {
    const cutoff = this.now().getTime() - maxProcessingMs;
    const released: Job[] = [];
    for (const job of this.jobs.values()) {
      if (job.status !== 'processing' || !job.startedAt || job.startedAt.getTime() >= cutoff) continue;
      const outcome = resolveFailure(job.retryCount, true, this.maxRetries);
      this.applyFailure(job, STALE_CLAIM_MESSAGE, outcome.status, outcome.retryCount);
      released.push(structuredClone(job));
    }
    return released;
  }

  async markWebhookSent(jobId: string): Promise<boolean> {
    const job = this.requireJob(jobId);
    if (job.webhookSent) return false;
    job.webhookSent = true;
    job.updatedAt = this.now();
    return true;
  }

  // ===== API KEYS =====

  async createApiKey(params: CreateApiKeyParams): Promise<ApiKey> {
    if (this.findKey(params.keyHash)) {
      throw new Error(`api key with hash ${params.keyHash.slice(0, 8)}… already exists`);
    }
    const key: ApiKey = {
      id: randomUUID(),
      keyHash: params.keyHash,
      keyPrefix: params.keyPrefix,
      name: params.name ?? null,
      userId: params.userId ?? null,
      organization: params.organization ?? null,
      isActive: params.isActive ?? true,
      expiresAt: params.expiresAt ?? null,
      rateLimit: params.rateLimit ?? DEFAULT_RATE_LIMIT,
      requestsCount: 0,
      lastUsedAt: null,
      createdAt: this.now()
    };
    this.apiKeys.set(key.id, key);
    return structuredClone(key);
  }

  async findApiKeyByHash(keyHash: string): Promise<ApiKey | null> {
    const key = this.findKey(keyHash);
    return key ? structuredClone(key) : null;
  }

  async consumeApiKeyQuota(keyHash: string, windowMs: number): Promise<QuotaDecision | null> {
    const key = this.findKey(keyHash);
    if (!key) return null;

    const now = this.now();
    const windowStart = now.getTime() - windowMs;
    const inWindow = (this.admitted.get(key.id) ?? []).filter(t => t > windowStart);
    const oldest = inWindow[0];

    const decision = evaluateQuota({
      limit: key.rateLimit,
      used: inWindow.length,
      oldest: oldest === undefined ? null : new Date(oldest),
      now,
      windowMs
    });
    if (decision.allowed) {
      inWindow.push(now.getTime());
      key.requestsCount += 1;
      key.lastUsedAt = now;
    }
    this.admitted.set(key.id, inWindow);
    return decision;
  }

  // ===== USAGE LOGS =====

  async appendUsageLog(entry: NewUsageLog): Promise<UsageLog> {
    const row: UsageLog = { ...entry, id: randomUUID(), createdAt: this.now() };
    this.usageLogs.push(row);
    return structuredClone(row);
  }

  async listUsageLogs(options?: { apiKeyHash?: string; limit?: number }): Promise<UsageLog[]> {
    return this.usageLogs
      .filter(row => !options?.apiKeyHash || row.apiKeyHash === options.apiKeyHash)
      .reverse()
      .slice(0, options?.limit ?? 100)
      .map(row => structuredClone(row));
  }

  // ===== INTERNALS =====

  private requireJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  private findKey(keyHash: string): ApiKey | undefined {
    for (const key of this.apiKeys.values()) {
      if (key.keyHash === keyHash) return key;
    }
    return undefined;
  }

  private seq(job: Job): number {
    return this.order.get(job.id) ?? 0;
  }

  private applyFailure(job: Job, errorMessage: string, status: 'pending' | 'failed', retryCount: number) {
    const now = this.now();
    job.status = status;
    job.retryCount = retryCount;
    job.errorMessage = errorMessage;
    job.completedAt = status === 'failed' ? now : null;
    job.processingTimeMs = status === 'failed' ? processingTime(job.startedAt, now) : null;
    job.claimedBy = null;
    job.updatedAt = now;
  }
}

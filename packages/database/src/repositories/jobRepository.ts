/**
 * Job Repository
 *
 * The job store's lifecycle operations under their pipeline names
 * (create, claim, complete, fail, recoverStale). Workers and the API depend on
 * this rather than on a concrete client, so either store implementation can sit
 * underneath.
 *
 * @see packages/database/src/stateMachine.ts - transition rules
 */

import type { IJobStore } from '../index';
import type { Job, JobCompletion, JobStatus } from '../models/job';

export interface FileMeta {
  fileName: string;
  filePath: string;
  fileSize: number;
}

export interface JobOwner {
  apiKeyHash: string;
  userId?: string | null;
}

export class JobRepository {
  constructor(private readonly db: IJobStore) {}

  /**
   * Create a new job in `pending`.
   */
  create(fileMeta: FileMeta, owner: JobOwner, webhookUrl?: string | null): Promise<Job> {
    return this.db.createJob({
      ...fileMeta,
      apiKeyHash: owner.apiKeyHash,
      userId: owner.userId ?? null,
      webhookUrl: webhookUrl ?? null
    });
  }

  findById(id: string): Promise<Job | null> {
    return this.db.getJobById(id);
  }

  /**
   * List an API key's jobs, newest first.
   */
  listByApiKey(apiKeyHash: string, limit = 50, status?: JobStatus): Promise<Job[]> {
    const opts: { limit?: number; status?: JobStatus } = { limit };
    if (status !== undefined) {
      opts.status = status;
    }
    return this.db.listJobsByApiKey(apiKeyHash, opts);
  }

  /**
   * Take the oldest pending job for `workerId`, or `null` when there is none.
   */
  claim(workerId: string): Promise<Job | null> {
    return this.db.claimJob(workerId);
  }

  complete(jobId: string, workerId: string, result: JobCompletion): Promise<Job> {
    return this.db.completeJob(jobId, workerId, result);
  }

  /**
   * Record a failed attempt. Retryable failures go back to `pending` while the
   * job-level retry bound allows; everything else ends in `failed`.
   */
  fail(jobId: string, workerId: string, errorMessage: string, retryable: boolean): Promise<Job> {
    return this.db.failJob(jobId, workerId, errorMessage, retryable);
  }

  recoverStale(maxProcessingMs: number): Promise<Job[]> {
    return this.db.recoverStaleJobs(maxProcessingMs);
  }

  markWebhookSent(jobId: string): Promise<boolean> {
    return this.db.markWebhookSent(jobId);
  }
}

/**
 * Job state machine.
 *
 * Both store implementations (PostgreSQL and in-process) route every write through
 * these rules so the two cannot drift:
 *
 *   pending ──claim──▶ processing ──complete──▶ completed
 *                         │  ▲
 *                         │  └──────── (never)
 *                         ├──fail(retryable, retries left)──▶ pending
 *                         └──fail(otherwise)───────────────▶ failed
 *
 * completed and failed are terminal.
 */
import { ClaimLostError, InvalidResultError, InvalidTransitionError } from './errors';
import type { Job, JobCompletion, JobStatus } from './models/job';

/** Job-level retries when the caller does not configure a bound. */
export const DEFAULT_MAX_RETRIES = 3;

/** Error recorded on a job whose claim outlived the processing bound. */
export const STALE_CLAIM_MESSAGE = 'processing timed out';

const ALLOWED: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['processing'],
  processing: ['completed', 'failed', 'pending'],
  completed: [],
  failed: []
};

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(jobId, from, to);
  }
}

/**
 * Check that `workerId` may move `job` to `to`. Transition legality is checked first,
 * so writing a terminal or pending job reports the transition, not the claim.
 */
export function assertOwnedTransition(job: Pick<Job, 'id' | 'status' | 'claimedBy'>, workerId: string, to: JobStatus) {
  assertTransition(job.id, job.status, to);
  if (job.claimedBy !== workerId) {
    throw new ClaimLostError(job.id, workerId, job.claimedBy);
  }
}

/** Where a failed attempt leaves the job. */
export interface FailureOutcome {
  status: 'pending' | 'failed';
  retryCount: number;
}

export function resolveFailure(retryCount: number, retryable: boolean, maxRetries: number): FailureOutcome {
  if (retryable && retryCount < maxRetries) {
    return { status: 'pending', retryCount: retryCount + 1 };
  }
  return { status: 'failed', retryCount };
}

export function assertCompletion(jobId: string, result: JobCompletion): void {
  if (!result.ipfsCid.trim()) throw new InvalidResultError(jobId, 'ipfsCid is empty');
  if (!result.encryptionKey.trim()) throw new InvalidResultError(jobId, 'encryptionKey is empty');
  if (Object.keys(result.parsedJson).length === 0) throw new InvalidResultError(jobId, 'parsedJson is empty');
}

export function processingTime(startedAt: Date | null, endedAt: Date): number | null {
  return startedAt ? Math.max(0, endedAt.getTime() - startedAt.getTime()) : null;
}

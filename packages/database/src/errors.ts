import type { JobStatus } from './models/job';

export type JobStoreErrorCode = 'NOT_FOUND' | 'INVALID_TRANSITION' | 'CLAIM_LOST' | 'INVALID_RESULT';

/**
 * Base class for job-store contract violations. These are programming errors in
 * the caller (a worker writing a job it does not own, or a transition the state
 * machine forbids), never transient conditions worth retrying.
 */
export class JobStoreError extends Error {
  code: JobStoreErrorCode;
  jobId: string;

  constructor(options: { message: string; code: JobStoreErrorCode; jobId: string }) {
    super(options.message);
    this.name = 'JobStoreError';
    this.code = options.code;
    this.jobId = options.jobId;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      jobId: this.jobId
    } satisfies Record<string, unknown>;
  }
}

export class JobNotFoundError extends JobStoreError {
  constructor(jobId: string) {
    super({ message: `Job ${jobId} not found`, code: 'NOT_FOUND', jobId });
    this.name = 'JobNotFoundError';
  }
}

export class InvalidTransitionError extends JobStoreError {
  from: JobStatus;
  to: JobStatus;

  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super({ message: `Job ${jobId}: transition ${from} → ${to} is not allowed`, code: 'INVALID_TRANSITION', jobId });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export class ClaimLostError extends JobStoreError {
  workerId: string;
  heldBy: string | null;

  constructor(jobId: string, workerId: string, heldBy: string | null) {
    super({
      message: `Job ${jobId} is not claimed by worker ${workerId} (held by ${heldBy ?? 'nobody'})`,
      code: 'CLAIM_LOST',
      jobId
    });
    this.name = 'ClaimLostError';
    this.workerId = workerId;
    this.heldBy = heldBy;
  }
}

export class InvalidResultError extends JobStoreError {
  constructor(jobId: string, detail: string) {
    super({ message: `Job ${jobId}: invalid completion result: ${detail}`, code: 'INVALID_RESULT', jobId });
    this.name = 'InvalidResultError';
  }
}

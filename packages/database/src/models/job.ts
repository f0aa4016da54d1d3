/**
 * Job status. `pending → processing → completed | failed`, with retryable
 * failures returning `processing → pending` until the retry bound is reached.
 */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = ['pending', 'processing', 'completed', 'failed'];

/**
 * One uploaded agreement's processing record.
 * Maps to the `jobs` table; field names are the camelCase form of its columns.
 */
export interface Job {
  id: string;
  fileName: string;
  /** Where the uploaded source document was written */
  filePath: string;
  fileSize: number;
  /** sha-256 hex of the API key that created the job */
  apiKeyHash: string;
  userId: string | null;
  status: JobStatus;
  /** Content address of the published artifact; set only when completed */
  ipfsCid: string | null;
  /** Base64 AES key of the published artifact */
  encryptionKey: string | null;
  /** Extracted deal terms; set only when completed */
  parsedJson: Record<string, unknown> | null;
  errorMessage: string | null;
  /** Job-level retries consumed so far */
  retryCount: number;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  processingTimeMs: number | null;
  modelUsed: string | null;
  webhookUrl: string | null;
  webhookSent: boolean;
  /** Worker currently holding the `processing` claim */
  claimedBy: string | null;
  updatedAt: Date;
}

export interface CreateJobParams {
  fileName: string;
  filePath: string;
  fileSize: number;
  apiKeyHash: string;
  userId?: string | null;
  webhookUrl?: string | null;
}

/** Result fields written by `complete`. */
export interface JobCompletion {
  ipfsCid: string;
  encryptionKey: string;
  parsedJson: Record<string, unknown>;
  modelUsed?: string | null;
}

export interface ListJobsOptions {
  limit?: number;
  status?: JobStatus;
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some(status => status === value);
}

/** Immutable per-request audit record (`usage_logs`). */
export interface UsageLog {
  id: string;
  jobId: string | null;
  apiKeyHash: string | null;
  endpoint: string;
  method: string;
  statusCode: number;
  processingTimeMs: number;
  fileSize: number | null;
  ipAddress: string | null;
  userAgent: string | null;
  createdAt: Date;
}

export type NewUsageLog = Omit<UsageLog, 'id' | 'createdAt'>;

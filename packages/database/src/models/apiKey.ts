/**
 * Tenant credential. The secret itself is never stored; lookups go through
 * `keyHash` (sha-256 hex of the presented key).
 */
export interface ApiKey {
  id: string;
  keyHash: string;
  /** First characters of the key, for display only */
  keyPrefix: string;
  name: string | null;
  userId: string | null;
  organization: string | null;
  isActive: boolean;
  expiresAt: Date | null;
  /** Requests admitted per rolling window */
  rateLimit: number;
  requestsCount: number;
  lastUsedAt: Date | null;
  createdAt: Date;
}

export interface CreateApiKeyParams {
  keyHash: string;
  keyPrefix: string;
  name?: string | null;
  userId?: string | null;
  organization?: string | null;
  isActive?: boolean;
  expiresAt?: Date | null;
  rateLimit?: number;
}

export const DEFAULT_RATE_LIMIT = 100;

export type ApiKeyState = 'usable' | 'inactive' | 'expired';

export function apiKeyState(key: Pick<ApiKey, 'isActive' | 'expiresAt'>, now: Date): ApiKeyState {
  if (!key.isActive) return 'inactive';
  if (key.expiresAt && key.expiresAt.getTime() <= now.getTime()) return 'expired';
  return 'usable';
}

/** Outcome of an atomic check-and-increment against a key's rolling window. */
export interface QuotaDecision {
  allowed: boolean;
  limit: number;
  /** Admitted requests in the window, including this one when allowed */
  used: number;
  remaining: number;
  /** When denied: time until the oldest admitted request leaves the window */
  retryAfterMs: number | null;
}

/**
 * Decide a request at `now` against the requests already admitted in
 * `(now - windowMs, now]`. Capacity frees up when the oldest one ages out.
 */
export function evaluateQuota(params: {
  limit: number;
  used: number;
  oldest: Date | null;
  now: Date;
  windowMs: number;
}): QuotaDecision {
  const { limit, used, oldest, now, windowMs } = params;
  if (used >= limit) {
    const retryAfterMs = oldest ? Math.max(0, oldest.getTime() + windowMs - now.getTime()) : windowMs;
    return { allowed: false, limit, used, remaining: 0, retryAfterMs };
  }
  return { allowed: true, limit, used: used + 1, remaining: Math.max(0, limit - used - 1), retryAfterMs: null };
}

/**
 * PostgreSQL schema for the agreement pipeline. Idempotent: every statement
 * tolerates an existing object, so it is safe to apply on each deploy.
 */
export const SCHEMA_SQL = `
CREATE EXTENSION IF NOT EXISTS "pgcrypto";

-- ============================================================================
-- JOBS - one uploaded agreement's processing record
-- ============================================================================
CREATE TABLE IF NOT EXISTS jobs (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    file_name TEXT NOT NULL,
    file_path TEXT NOT NULL,
    file_size BIGINT NOT NULL,
    api_key_hash VARCHAR(64) NOT NULL,
    user_id TEXT,
    status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
    ipfs_cid TEXT,
    encryption_key TEXT,
    parsed_json JSONB,
    error_message TEXT,
    retry_count INTEGER NOT NULL DEFAULT 0 CHECK (retry_count >= 0),
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    started_at TIMESTAMPTZ,
    completed_at TIMESTAMPTZ,
    processing_time_ms BIGINT,
    model_used TEXT,
    webhook_url TEXT,
    webhook_sent BOOLEAN NOT NULL DEFAULT FALSE,
    claimed_by TEXT,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT jobs_completed_has_result CHECK (
        status <> 'completed' OR (ipfs_cid IS NOT NULL AND encryption_key IS NOT NULL AND parsed_json IS NOT NULL)
    ),
    CONSTRAINT jobs_failed_has_error CHECK (status <> 'failed' OR error_message IS NOT NULL),
    CONSTRAINT jobs_processing_is_claimed CHECK ((status = 'processing') = (claimed_by IS NOT NULL))
);

-- Claim scans pending jobs oldest first
CREATE INDEX IF NOT EXISTS idx_jobs_pending ON jobs(created_at) WHERE status = 'pending';
CREATE INDEX IF NOT EXISTS idx_jobs_processing_started ON jobs(started_at) WHERE status = 'processing';
CREATE INDEX IF NOT EXISTS idx_jobs_api_key_hash ON jobs(api_key_hash, created_at DESC);

-- ============================================================================
-- API KEYS - tenant credentials (sha-256 of the secret only)
-- ============================================================================
CREATE TABLE IF NOT EXISTS api_keys (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    key_hash VARCHAR(64) NOT NULL UNIQUE,
    key_prefix VARCHAR(16) NOT NULL,
    name TEXT,
    user_id TEXT,
    organization TEXT,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    expires_at TIMESTAMPTZ,
    rate_limit INTEGER NOT NULL DEFAULT 100 CHECK (rate_limit >= 0),
    requests_count BIGINT NOT NULL DEFAULT 0,
    last_used_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- Admitted requests inside the rolling window; older rows are pruned on write
CREATE TABLE IF NOT EXISTS api_key_requests (
    id BIGSERIAL PRIMARY KEY,
    api_key_id UUID NOT NULL REFERENCES api_keys(id) ON DELETE CASCADE,
    requested_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_api_key_requests_window ON api_key_requests(api_key_id, requested_at);

-- ============================================================================
-- USAGE LOGS - append-only request audit
-- ============================================================================
CREATE TABLE IF NOT EXISTS usage_logs (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    job_id UUID REFERENCES jobs(id),
    api_key_hash VARCHAR(64),
    endpoint TEXT NOT NULL,
    method VARCHAR(10) NOT NULL,
    status_code INTEGER NOT NULL,
    processing_time_ms BIGINT NOT NULL,
    file_size BIGINT,
    ip_address TEXT,
    user_agent TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_usage_logs_api_key_hash ON usage_logs(api_key_hash, created_at DESC);
`;

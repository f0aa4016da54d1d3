/**
 * @fileoverview Job management routes
 *
 * - GET /, GET /api/health - service health with database reachability
 * - POST /api/parse - upload an agreement and create a job (`?sync=true` waits for the result)
 * - GET /api/jobs/:jobId - one job, scoped to the calling API key
 * - GET /api/jobs - the calling key's jobs, newest first
 *
 * Everything except health runs behind the usage logger and the auth gate,
 * which leave the key on `req.apiKey`.
 */
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';

import { createLogger, errorMessage, type AppConfig } from '@rights-parser/shared';
import {
  isJobStatus,
  isTerminal,
  type IDatabaseClient,
  type Job,
  type JobRepository,
  type JobStatus
} from '@rights-parser/database';

import { getApiInfo } from '../index';
import type { ContentStore } from '../services/storage/ipfs';
import { detectFormat } from '../services/text';
import { pickUpload, storeUpload } from '../utils/uploads';
import { ApiError, asyncHandler, isUuid, jobView } from './http';

const log = createLogger('jobs');

export interface JobRoutesDeps {
  db: Pick<IDatabaseClient, 'healthCheck'>;
  /** Reported by the health route when given */
  contentStore?: Pick<ContentStore, 'healthCheck' | 'provider'>;
  jobs: JobRepository;
  http: AppConfig['http'];
  /** Called after a job is created; the worker pool uses it to skip its idle wait */
  onJobCreated?: (job: Job) => void;
  sleep?: (ms: number) => Promise<void>;
}

const ParseBodySchema = z.object({
  webhook_url: z
    .string()
    .trim()
    .max(2048)
    .url()
    .refine(v => /^https?:\/\//i.test(v), 'webhook_url must use http or https')
    .optional(),
  user_id: z.string().trim().min(1).max(255).optional()
});

const ListQuerySchema = z.object({
  status: z.custom<JobStatus>(v => isJobStatus(v), 'Invalid job status').optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50)
});

function requireKey(req: Request) {
  const key = req.apiKey;
  const keyHash = req.apiKeyHash;
  if (!key || !keyHash) {
    throw new ApiError('unauthorized', 'API key required');
  }
  return { key, keyHash };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

type Reachability = 'connected' | 'unavailable';

async function checkDependency(name: string, check: () => Promise<boolean>): Promise<Reachability> {
  try {
    return (await check()) ? 'connected' : 'unavailable';
  } catch (err) {
    log.warn('Health check failed', { dependency: name, error: errorMessage(err) });
    return 'unavailable';
  }
}

export function healthHandler(deps: Pick<JobRoutesDeps, 'db' | 'contentStore'>): RequestHandler {
  return asyncHandler(async (_req, res) => {
    const store = deps.contentStore;
    const [database, contentStore] = await Promise.all([
      checkDependency('database', () => deps.db.healthCheck()),
      store ? checkDependency(store.provider, () => store.healthCheck()) : Promise.resolve(null)
    ]);
    const up = database === 'connected' && contentStore !== 'unavailable';
    const info = getApiInfo(up ? 'healthy' : 'degraded');
    res.status(up ? 200 : 503).json({
      status: info.status,
      service: info.name,
      version: info.version,
      uptime: Math.round(process.uptime()),
      database,
      ...(store ? { content_store: { provider: store.provider, status: contentStore } } : {})
    });
  });
}

/**
 * Poll until the job is terminal or the deadline passes; returns the last seen state.
 */
async function waitForTerminal(deps: JobRoutesDeps, jobId: string): Promise<Job | null> {
  const sleep = deps.sleep ?? defaultSleep;
  const deadline = Date.now() + deps.http.syncTimeoutMs;
  let job = await deps.jobs.findById(jobId);
  while (job && !isTerminal(job.status) && Date.now() < deadline) {
    await sleep(Math.min(deps.http.syncPollMs, Math.max(0, deadline - Date.now())));
    job = await deps.jobs.findById(jobId);
  }
  return job;
}

function sendSyncResult(res: Response, job: Job): void {
  if (job.status === 'completed') {
    res.status(200).json(jobView(job));
  } else if (job.status === 'failed') {
    res.status(422).json({ ...jobView(job), error_code: 'extraction_failed', message: job.errorMessage });
  } else {
    res.status(202).json(jobView(job));
  }
}

export function parseHandler(deps: JobRoutesDeps): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { keyHash } = requireKey(req);

    const file = pickUpload(req);
    if (!file) {
      throw new ApiError('bad_request', 'A document is required in the "pdf" or "file" field');
    }
    if (file.size === 0) {
      throw new ApiError('bad_request', 'Uploaded document is empty');
    }
    const format = detectFormat({ buffer: file.buffer, fileName: file.originalname, mimeType: file.mimetype });
    if (!format) {
      throw new ApiError('bad_request', 'Only PDF and plain-text documents are accepted');
    }
    const body = ParseBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      throw new ApiError('bad_request', firstIssue(body.error));
    }

    const filePath = await storeUpload(deps.http.uploadDir, file, format);
    const job = await deps.jobs.create(
      { fileName: file.originalname, filePath, fileSize: file.size },
      { apiKeyHash: keyHash, userId: body.data.user_id ?? null },
      body.data.webhook_url ?? null
    );
    req.jobId = job.id;
    log.info('Job created', { jobId: job.id, fileName: job.fileName, fileSize: job.fileSize, sync: req.query['sync'] === 'true' });
    deps.onJobCreated?.(job);

    if (req.query['sync'] !== 'true') {
      res.status(202).json({ job_id: job.id, status: job.status, created_at: job.createdAt.toISOString() });
      return;
    }
    const settled = await waitForTerminal(deps, job.id);
    sendSyncResult(res, settled ?? job);
  });
}

export function getJobHandler(deps: Pick<JobRoutesDeps, 'jobs'>): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { keyHash } = requireKey(req);
    const jobId = req.params['jobId'] ?? '';
    if (!isUuid(jobId)) {
      throw new ApiError('bad_request', 'job_id must be a valid UUID');
    }
    const job = await deps.jobs.findById(jobId);
    // Another key's job is indistinguishable from a missing one
    if (!job || job.apiKeyHash !== keyHash) {
      throw new ApiError('not_found', 'Job not found');
    }
    req.jobId = job.id;
    res.status(200).json(jobView(job));
  });
}

export function listJobsHandler(deps: Pick<JobRoutesDeps, 'jobs'>): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { keyHash } = requireKey(req);
    const query = ListQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ApiError('bad_request', firstIssue(query.error));
    }
    const jobs = await deps.jobs.listByApiKey(keyHash, query.data.limit, query.data.status);
    res.status(200).json({ jobs: jobs.map(jobView), count: jobs.length });
  });
}

/**
 * Express application. Dependencies are passed in so the server entry point
 * and the tests can wire different stores and collaborators.
 */
import express, { type Express } from 'express';

import type { AppConfig } from '@rights-parser/shared';
import type { IDatabaseClient, Job, JobRepository } from '@rights-parser/database';

import { errorHandler, errorBody } from './handlers/http';
import { getJobHandler, healthHandler, listJobsHandler, parseHandler } from './handlers/job-management';
import { createAuthGate } from './middleware/auth';
import type { ContentStore } from './services/storage/ipfs';
import { createUsageLogger } from './middleware/usage';
import { createUploadMiddleware } from './utils/uploads';

export interface AppDeps {
  db: IDatabaseClient;
  /** Reported by the health route when given */
  contentStore?: Pick<ContentStore, 'healthCheck' | 'provider'>;
  jobs: JobRepository;
  config: Pick<AppConfig, 'http' | 'rateLimit'>;
  onJobCreated?: (job: Job) => void;
  /** Clock for key expiry checks */
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', deps.config.http.trustProxyHops);

  const health = healthHandler({ db: deps.db, contentStore: deps.contentStore });
  app.get('/', health);
  app.get('/api/health', health);

  const usage = createUsageLogger(deps.db);
  const auth = createAuthGate({ keys: deps.db, windowMs: deps.config.rateLimit.windowMs, now: deps.now });
  const routeDeps = {
    db: deps.db,
    jobs: deps.jobs,
    http: deps.config.http,
    onJobCreated: deps.onJobCreated,
    sleep: deps.sleep
  };

  app.post('/api/parse', usage, createUploadMiddleware(deps.config.http.maxUploadBytes), auth, parseHandler(routeDeps));
  app.get('/api/jobs', usage, auth, listJobsHandler(routeDeps));
  app.get('/api/jobs/:jobId', usage, auth, getJobHandler(routeDeps));

  app.use((_req, res) => {
    res.status(404).json(errorBody('not_found', 'Route not found'));
  });
  app.use(errorHandler);

  return app;
}

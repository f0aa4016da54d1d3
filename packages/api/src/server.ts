/**
 * Process entry point: HTTP server, worker pool and webhook dispatcher in one
 * process. `STORE_DRIVER=memory` runs everything without PostgreSQL.
 */
import 'dotenv/config';

import { createLogger, errorMessage, getConfig, getProjectInfo, type AppConfig } from '@rights-parser/shared';
import {
  JobRepository,
  MemoryDatabaseClient,
  clearCachedClient,
  getSharedDatabaseClient,
  resolveDatabaseConfig,
  type IDatabaseClient
} from '@rights-parser/database';

import { createApp } from './app';
import { flushSpans, shutdown as shutdownTracing } from './instrumentation';
import { ExtractionOrchestrator } from './services/extraction/orchestrator';
import { createAzureEngine } from './services/llm/client';
import { getContentStore } from './services/storage/ipfs';
import { ArtifactPublisher } from './services/storage/publisher';
import { createTextExtractor } from './services/text';
import { WebhookDispatcher } from './services/webhooks/dispatcher';
import { WorkerPool } from './workers/pool';
import { createJobProcessor } from './workers/process-job';

const log = createLogger('server');

async function openStore(config: AppConfig): Promise<IDatabaseClient> {
  if (config.database.driver === 'memory') {
    log.warn('Using the in-process job store; data is lost on exit');
    return new MemoryDatabaseClient({ maxRetries: config.jobs.maxRetries });
  }
  const dbConfig = await resolveDatabaseConfig(config.database, config.jobs.maxRetries);
  return getSharedDatabaseClient(dbConfig);
}

async function main(): Promise<void> {
  const config = getConfig();
  const db = await openStore(config);
  const jobs = new JobRepository(db);

  const contentStore = getContentStore(config.contentStore);
  const webhooks = new WebhookDispatcher(jobs, config.webhooks);
  const orchestrator = new ExtractionOrchestrator(createAzureEngine(), config.extraction);
  const processor = createJobProcessor({
    jobs,
    textExtractor: createTextExtractor(),
    orchestrator,
    publisher: new ArtifactPublisher(contentStore),
    webhooks,
    minTextLength: config.workers.minTextLength
  });
  const pool = new WorkerPool(jobs, processor, webhooks, {
    ...config.workers,
    maxProcessingMs: config.jobs.maxProcessingMs
  });

  const app = createApp({ db, contentStore, jobs, config, onJobCreated: () => pool.wake() });
  const server = app.listen(config.http.port, config.http.host, () => {
    log.info('Listening', {
      ...getProjectInfo(config.environment),
      host: config.http.host,
      port: config.http.port,
      store: config.database.driver,
      model: orchestrator.modelId
    });
  });
  pool.start();

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info('Shutting down', { signal });
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    await pool.stop();
    await webhooks.drain();
    await flushSpans();
    await shutdownTracing();
    await (config.database.driver === 'memory' ? db.end() : clearCachedClient());
    log.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      stop(signal).then(
        () => process.exit(0),
        err => {
          log.error('Shutdown failed', { error: errorMessage(err) });
          process.exit(1);
        }
      );
    });
  }
}

main().catch(err => {
  log.error('Startup failed', { error: errorMessage(err) });
  process.exit(1);
});

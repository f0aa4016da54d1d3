/**
 * Worker pool: `concurrency` async loops, each claim → process → repeat, with
 * an idle wait when the queue is empty. A housekeeping timer releases claims
 * held past `maxProcessingMs`.
 *
 * Workers share nothing but the job store; the store's conditional claim is
 * the only coordination, so several processes can run pools against one
 * database.
 */
import { randomUUID } from 'node:crypto';

import { createLogger, errorMessage, type AppConfig } from '@rights-parser/shared';
import { isTerminal, type Job, type JobRepository } from '@rights-parser/database';

import type { WebhookDispatcher } from '../services/webhooks/dispatcher';
import type { JobProcessor } from './process-job';

const log = createLogger('worker-pool');

export type WorkerPoolOptions = AppConfig['workers'] & {
  maxProcessingMs: number;
  /** Prefix of generated worker ids */
  name?: string;
};

export class WorkerPool {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly sleepers = new Set<() => void>();
  private readonly prefix: string;

  constructor(
    private readonly jobs: JobRepository,
    private readonly processor: JobProcessor,
    private readonly webhooks: Pick<WebhookDispatcher, 'enqueue'>,
    private readonly options: WorkerPoolOptions
  ) {
    this.prefix = options.name ?? `worker-${randomUUID().slice(0, 8)}`;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;

    const count = Math.max(1, this.options.concurrency);
    for (let i = 1; i <= count; i++) {
      this.loops.push(this.loop(`${this.prefix}-${i}`, controller.signal));
    }
    this.sweepTimer = setInterval(() => {
      this.sweep().catch(err => {
        log.error('Stale claim sweep failed', { error: errorMessage(err) });
      });
    }, this.options.staleSweepMs);
    this.sweepTimer.unref();

    log.info('Worker pool started', { workers: count, prefix: this.prefix });
  }

  /**
   * Stop claiming. Idle waits end immediately; a job already in hand is
   * finished first. Resolves when every loop has exited.
   */
  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    log.info('Worker pool stopped', { prefix: this.prefix });
  }

  /**
   * End every idle wait now. Called when a job is created so it is picked up
   * without waiting out the poll interval.
   */
  wake(): void {
    for (const done of [...this.sleepers]) done();
  }

  /**
   * Claim and process at most one job.
   *
   * @returns whether a job was claimed
   */
  async runOnce(workerId: string): Promise<boolean> {
    const job = await this.jobs.claim(workerId);
    if (!job) return false;
    log.info('Job claimed', { jobId: job.id, workerId, retryCount: job.retryCount });
    await this.processor(job, workerId);
    return true;
  }

  /**
   * Release claims held past `maxProcessingMs`. Jobs the release made terminal
   * get their webhook here, since no worker will.
   */
  async sweep(): Promise<Job[]> {
    const released = await this.jobs.recoverStale(this.options.maxProcessingMs);
    for (const job of released) {
      log.warn('Released stale claim', { jobId: job.id, status: job.status, retryCount: job.retryCount });
      if (isTerminal(job.status)) {
        this.webhooks.enqueue(job);
      }
    }
    return released;
  }

  private async loop(workerId: string, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let claimed = false;
      try {
        claimed = await this.runOnce(workerId);
      } catch (err) {
        log.error('Worker iteration failed', { workerId, error: errorMessage(err) });
      }
      if (!claimed) {
        await this.idle(signal);
      }
    }
  }

  /** Resolves after `idleMs`, on `wake()`, or as soon as `signal` aborts. */
  private idle(signal: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        this.sleepers.delete(done);
        resolve();
      };
      const timer = setTimeout(done, this.options.idleMs);
      signal.addEventListener('abort', done, { once: true });
      this.sleepers.add(done);
    });
  }
}

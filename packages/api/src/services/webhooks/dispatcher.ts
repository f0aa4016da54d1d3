/**
 * Webhook dispatcher.
 *
 * Delivers a terminal job's notification off the worker's critical path. Each
 * delivery gets `maxAttempts` tries with exponential backoff and jitter; a 2xx
 * response marks the job's `webhookSent` and ends the delivery. Exhausting the
 * attempts is logged and otherwise ignored: webhook outcomes never touch the
 * job's own status.
 */
import { PROJECT_NAME, VERSION, createLogger, errorMessage, type AppConfig } from '@rights-parser/shared';
import { isTerminal, type IJobStore, type Job } from '@rights-parser/database';

const log = createLogger('webhooks');

export interface WebhookPayload {
  job_id: string;
  status: 'completed' | 'failed';
  ipfs_cid?: string | null;
  error_message?: string | null;
  timestamp: string;
}

export type WebhookDispatcherOptions = AppConfig['webhooks'] & {
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export function buildWebhookPayload(job: Job, now: Date = new Date()): WebhookPayload {
  if (job.status === 'completed') {
    return { job_id: job.id, status: 'completed', ipfs_cid: job.ipfsCid, timestamp: now.toISOString() };
  }
  return { job_id: job.id, status: 'failed', error_message: job.errorMessage, timestamp: now.toISOString() };
}

function backoff(baseDelayMs: number, attempt: number): number {
  const delay = baseDelayMs * 2 ** (attempt - 1);
  return delay + Math.floor(Math.random() * Math.min(200, baseDelayMs));
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class WebhookDispatcher {
  private readonly inflight = new Map<string, Promise<void>>();
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly jobs: Pick<IJobStore, 'markWebhookSent'>,
    private readonly options: WebhookDispatcherOptions
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Queue a notification for a terminal job with a webhook URL. Returns false
   * when there is nothing to send (no URL, already sent, already in flight,
   * or the job is not terminal).
   */
  enqueue(job: Job): boolean {
    if (!job.webhookUrl || job.webhookSent || !isTerminal(job.status) || this.inflight.has(job.id)) {
      return false;
    }
    const url = job.webhookUrl;
    const payload = buildWebhookPayload(job);
    const delivery = this.deliver(job.id, url, payload)
      .catch(err => {
        log.error('Webhook delivery crashed', { jobId: job.id, error: errorMessage(err) });
      })
      .finally(() => {
        this.inflight.delete(job.id);
      });
    this.inflight.set(job.id, delivery);
    return true;
  }

  get pending(): number {
    return this.inflight.size;
  }

  /** Resolves once every queued delivery has finished. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight.values()]);
    }
  }

  private async deliver(jobId: string, url: string, payload: WebhookPayload): Promise<void> {
    const body = JSON.stringify(payload);
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        const res = await this.fetchFn(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', 'User-Agent': `${PROJECT_NAME}-webhook/${VERSION}` },
          body,
          signal: AbortSignal.timeout(this.options.timeoutMs)
        });
        if (res.ok) {
          await this.recordDelivered(jobId, url, res.status, attempt);
          return;
        }
        log.warn('Webhook rejected', { jobId, url, status: res.status, attempt, maxAttempts: this.options.maxAttempts });
      } catch (err) {
        log.warn('Webhook attempt failed', {
          jobId,
          url,
          attempt,
          maxAttempts: this.options.maxAttempts,
          error: errorMessage(err)
        });
      }
      if (attempt < this.options.maxAttempts) {
        await this.sleep(backoff(this.options.baseDelayMs, attempt));
      }
    }
    log.error('Webhook delivery exhausted', { jobId, url, attempts: this.options.maxAttempts });
  }

  /** The receiver has the notification; a store failure here must not trigger a resend. */
  private async recordDelivered(jobId: string, url: string, status: number, attempt: number): Promise<void> {
    try {
      const flipped = await this.jobs.markWebhookSent(jobId);
      log.info('Webhook delivered', { jobId, url, status, attempt, flagged: flipped });
    } catch (err) {
      log.error('Webhook delivered but webhook_sent could not be recorded', {
        jobId,
        url,
        status,
        attempt,
        error: errorMessage(err)
      });
    }
  }
}

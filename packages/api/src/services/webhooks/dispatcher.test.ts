import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MemoryDatabaseClient, type Job } from '@rights-parser/database';

import { WebhookDispatcher, buildWebhookPayload } from './dispatcher';

const CONFIG = { maxAttempts: 3, timeoutMs: 1_000, baseDelayMs: 100 };

async function terminalJob(db: MemoryDatabaseClient, outcome: 'completed' | 'failed', webhookUrl: string | null = 'https://hooks.test/done') {
  const job = await db.createJob({ fileName: 'deal.txt', filePath: '/tmp/deal.txt', fileSize: 10, apiKeyHash: 'hash', webhookUrl });
  await db.claimJob('w1');
  if (outcome === 'completed') {
    return db.completeJob(job.id, 'w1', { ipfsCid: 'bafy-test', encryptionKey: 'test-key', parsedJson: { territory: 'India' } });
  }
  return db.failJob(job.id, 'w1', 'bad document', false);
}

describe('buildWebhookPayload', () => {
  it('carries the CID for completed jobs and the error for failed ones', async () => {
    const db = new MemoryDatabaseClient();
    const at = new Date('2025-01-01T00:00:00Z');
    const completed = await terminalJob(db, 'completed');
    const failed = await terminalJob(db, 'failed');

    expect(buildWebhookPayload(completed, at)).toEqual({
      job_id: completed.id,
      status: 'completed',
      ipfs_cid: 'bafy-test',
      timestamp: '2025-01-01T00:00:00.000Z'
    });
    expect(buildWebhookPayload(failed, at)).toEqual({
      job_id: failed.id,
      status: 'failed',
      error_message: 'bad document',
      timestamp: '2025-01-01T00:00:00.000Z'
    });
  });
});

describe('WebhookDispatcher', () => {
  let db: MemoryDatabaseClient;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    db = new MemoryDatabaseClient();
    sleep.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('posts the payload once and flags the job on 2xx', async () => {
    const job = await terminalJob(db, 'completed');
    const fetchFn = vi.fn<typeof fetch>(async () => new Response(null, { status: 204 }));
    const dispatcher = new WebhookDispatcher(db, { ...CONFIG, fetchFn, sleep });

    expect(dispatcher.enqueue(job)).toBe(true);
    await dispatcher.drain();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe('https://hooks.test/done');
    const init = fetchFn.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ job_id: job.id, status: 'completed', ipfs_cid: 'bafy-test' });
    expect((await db.getJobById(job.id))?.webhookSent).toBe(true);
    expect(dispatcher.pending).toBe(0);
  });

  it('does not post again when recording the delivery fails', async () => {
    const job = await terminalJob(db, 'completed');
    const fetchFn = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
    const markWebhookSent = vi.fn(async (_jobId: string): Promise<boolean> => {
      throw new Error('connection terminated');
    });
    const dispatcher = new WebhookDispatcher({ markWebhookSent }, { ...CONFIG, fetchFn, sleep });

    dispatcher.enqueue(job);
    await dispatcher.drain();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(markWebhookSent).toHaveBeenCalledTimes(1);
    expect(markWebhookSent).toHaveBeenCalledWith(job.id);
    expect(sleep).not.toHaveBeenCalled();
    expect(dispatcher.pending).toBe(0);
  });

  it('backs off exponentially between failed attempts', async () => {
    const job = await terminalJob(db, 'completed');
    const statuses = [500, 503, 200];
    const fetchFn = vi.fn<typeof fetch>(async () => new Response('', { status: statuses.shift() ?? 200 }));
    const dispatcher = new WebhookDispatcher(db, { ...CONFIG, fetchFn, sleep });

    dispatcher.enqueue(job);
    await dispatcher.drain();

    expect(fetchFn).toHaveBeenCalledTimes(3);
    const delays = sleep.mock.calls.map(call => call[0]);
    expect(delays).toHaveLength(2);
    expect(delays[0]).toBeGreaterThanOrEqual(100);
    expect(delays[0]).toBeLessThan(200);
    expect(delays[1]).toBeGreaterThanOrEqual(200);
    expect(delays[1]).toBeLessThan(300);
    expect((await db.getJobById(job.id))?.webhookSent).toBe(true);
  });

  it('leaves the job untouched when every attempt fails', async () => {
    const job = await terminalJob(db, 'failed');
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const dispatcher = new WebhookDispatcher(db, { ...CONFIG, fetchFn, sleep });

    dispatcher.enqueue(job);
    await dispatcher.drain();

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    const after = await db.getJobById(job.id);
    expect(after?.webhookSent).toBe(false);
    expect(after?.status).toBe('failed');
    expect(after?.errorMessage).toBe('bad document');
  });

  it('only queues terminal jobs with a URL that are not already sent or in flight', async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
    const dispatcher = new WebhookDispatcher(db, { ...CONFIG, fetchFn, sleep });

    const noUrl = await terminalJob(db, 'completed', null);
    const done = await terminalJob(db, 'completed');
    const pending: Job = await db.createJob({
      fileName: 'p.txt',
      filePath: '/tmp/p.txt',
      fileSize: 1,
      apiKeyHash: 'hash',
      webhookUrl: 'https://hooks.test/p'
    });

    expect(dispatcher.enqueue(noUrl)).toBe(false);
    expect(dispatcher.enqueue(pending)).toBe(false);
    expect(dispatcher.enqueue(done)).toBe(true);
    expect(dispatcher.enqueue(done)).toBe(false);
    await dispatcher.drain();

    expect(dispatcher.enqueue({ ...done, webhookSent: true })).toBe(false);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});

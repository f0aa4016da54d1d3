import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { JobRepository, MemoryDatabaseClient, type Job } from '@rights-parser/database';

import { WorkerPool, type WorkerPoolOptions } from './pool';
import type { JobProcessor } from './process-job';

const OPTIONS: WorkerPoolOptions = {
  concurrency: 2,
  idleMs: 10,
  staleSweepMs: 60_000,
  minTextLength: 0,
  maxProcessingMs: 10 * 60_000,
  name: 'test'
};

function newJob(jobs: JobRepository, name: string) {
  return jobs.create({ fileName: name, filePath: `/uploads/${name}`, fileSize: 1 }, { apiKeyHash: 'hash' });
}

describe('WorkerPool', () => {
  let db: MemoryDatabaseClient;
  let jobs: JobRepository;
  let pool: WorkerPool | null;
  const enqueue = vi.fn((_job: Job) => true);

  const completing: JobProcessor = (job, workerId) =>
    jobs.complete(job.id, workerId, { ipfsCid: 'bafy-test', encryptionKey: 'test-key', parsedJson: { ok: true } });

  beforeEach(() => {
    db = new MemoryDatabaseClient();
    jobs = new JobRepository(db);
    pool = null;
    enqueue.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    await pool?.stop();
  });

  it('runOnce reports whether a job was claimed', async () => {
    const processor = vi.fn(completing);
    pool = new WorkerPool(jobs, processor, { enqueue }, OPTIONS);

    await expect(pool.runOnce('test-1')).resolves.toBe(false);
    const job = await newJob(jobs, 'a.txt');
    await expect(pool.runOnce('test-1')).resolves.toBe(true);
    expect(processor).toHaveBeenCalledWith(expect.objectContaining({ id: job.id, status: 'processing' }), 'test-1');
  });

  it('drains the queue with concurrent workers and stops cleanly', async () => {
    const created = await Promise.all(['a.txt', 'b.txt', 'c.txt'].map(name => newJob(jobs, name)));
    const workers = new Set<string>();
    pool = new WorkerPool(
      jobs,
      (job, workerId) => {
        workers.add(workerId);
        return completing(job, workerId);
      },
      { enqueue },
      OPTIONS
    );

    pool.start();
    expect(pool.running).toBe(true);
    await vi.waitFor(async () => {
      const done = await jobs.listByApiKey('hash', 10, 'completed');
      expect(done).toHaveLength(3);
    });
    await pool.stop();

    expect(pool.running).toBe(false);
    for (const job of created) {
      expect((await jobs.findById(job.id))?.status).toBe('completed');
    }
    for (const workerId of workers) {
      expect(['test-1', 'test-2']).toContain(workerId);
    }
  });

  it('stop() ends idle waits without waiting out the interval', async () => {
    pool = new WorkerPool(jobs, completing, { enqueue }, { ...OPTIONS, idleMs: 60_000 });
    pool.start();
    await new Promise(resolve => setTimeout(resolve, 20));

    const t0 = Date.now();
    await pool.stop();
    expect(Date.now() - t0).toBeLessThan(1_000);
  });

  it('wake() lets idle workers pick up a new job immediately', async () => {
    pool = new WorkerPool(jobs, completing, { enqueue }, { ...OPTIONS, idleMs: 60_000 });
    pool.start();
    await new Promise(resolve => setTimeout(resolve, 20));

    const job = await newJob(jobs, 'late.txt');
    pool.wake();

    await vi.waitFor(async () => {
      expect((await jobs.findById(job.id))?.status).toBe('completed');
    });
  });

  it('keeps running when an iteration throws', async () => {
    let calls = 0;
    await newJob(jobs, 'a.txt');
    await newJob(jobs, 'b.txt');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    pool = new WorkerPool(
      jobs,
      async (job, workerId) => {
        calls++;
        if (calls === 1) throw new Error('store unavailable');
        return completing(job, workerId);
      },
      { enqueue },
      { ...OPTIONS, concurrency: 1 }
    );

    pool.start();
    await vi.waitFor(() => {
      expect(calls).toBe(2);
    });
  });
});

describe('WorkerPool.sweep', () => {
  it('releases stale claims and notifies for the ones that became terminal', async () => {
    let now = new Date('2025-01-01T00:00:00Z');
    const db = new MemoryDatabaseClient({ maxRetries: 1, now: () => now });
    const jobs = new JobRepository(db);
    const enqueue = vi.fn((_job: Job) => true);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const pool = new WorkerPool(jobs, async () => null, { enqueue }, OPTIONS);

    const job = await newJob(jobs, 'stuck.txt');
    await jobs.claim('crashed-worker');

    now = new Date('2025-01-01T00:11:00Z');
    const first = await pool.sweep();
    expect(first.map(j => [j.id, j.status, j.retryCount])).toEqual([[job.id, 'pending', 1]]);
    expect(first[0]?.errorMessage).toBe('processing timed out');
    expect(enqueue).not.toHaveBeenCalled();

    await jobs.claim('crashed-again');
    now = new Date('2025-01-01T00:22:00Z');
    const second = await pool.sweep();
    expect(second.map(j => j.status)).toEqual(['failed']);
    expect(enqueue).toHaveBeenCalledTimes(1);

    await expect(pool.sweep()).resolves.toEqual([]);
  });
});

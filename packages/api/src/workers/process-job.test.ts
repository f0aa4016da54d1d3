import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { JobRepository, MemoryDatabaseClient, type Job } from '@rights-parser/database';

import { ExtractionExhaustedError, ExtractionFailure, ExtractionOrchestrator } from '../services/extraction/orchestrator';
import { LlmError } from '../services/llm/client';
import { ArtifactPublisher, PublishError } from '../services/storage/publisher';
import { TextExtractionError, createTextExtractor } from '../services/text';
import { MemoryContentStore, ScriptedEngine, immediate } from '../testing/fakes';
import { createJobProcessor, isRetryable, type JobProcessorDeps } from './process-job';

const AGREEMENT = 'Sony licenses Spider-Man to Zee, India, SVOD, USD 2,500,000, 5 years';
const ENGINE_OUTPUT = JSON.stringify({
  parties: { licensor: 'Sony', licensee: 'Zee' },
  content: 'Spider-Man',
  territory: 'India',
  media_rights: ['SVOD'],
  term: '5 years',
  financial_terms: { fee: 'USD 2,500,000' }
});
const EXTRACTION = { maxAttempts: 2, attemptTimeoutMs: 1_000, backoffMs: 0, maxInputChars: 10_000, repairJson: false };

describe('isRetryable', () => {
  it('classifies failures', () => {
    expect(isRetryable(new TextExtractionError('scanned'))).toBe(false);
    expect(isRetryable(new LlmError({ message: 'no', category: 'AUTH' }))).toBe(false);
    expect(isRetryable(new LlmError({ message: 'slow', category: 'QUOTA' }))).toBe(true);
    expect(
      isRetryable(new ExtractionExhaustedError(3, new ExtractionFailure({ message: 'bad', reason: 'PARSE', attempt: 3 })))
    ).toBe(true);
    expect(isRetryable(new PublishError('job', 'ipfs', new Error('down')))).toBe(true);
    expect(isRetryable(new TypeError('fetch failed'))).toBe(true);
  });
});

describe('createJobProcessor', () => {
  let db: MemoryDatabaseClient;
  let jobs: JobRepository;
  let store: MemoryContentStore;
  let enqueue: Mock<(job: Job) => boolean>;
  let files: Map<string, Buffer>;

  function deps(engine: ScriptedEngine, overrides: Partial<JobProcessorDeps> = {}): JobProcessorDeps {
    return {
      jobs,
      textExtractor: createTextExtractor(),
      orchestrator: new ExtractionOrchestrator(engine, EXTRACTION, { sleep: immediate }),
      publisher: new ArtifactPublisher(store),
      webhooks: { enqueue },
      minTextLength: 20,
      readFile: async path => {
        const file = files.get(path);
        if (!file) throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: 'ENOENT' });
        return file;
      },
      ...overrides
    };
  }

  async function claimNew(fileName = 'deal.txt', text: string | null = AGREEMENT): Promise<Job> {
    const filePath = `/uploads/${fileName}`;
    if (text !== null) files.set(filePath, Buffer.from(text));
    await jobs.create({ fileName, filePath, fileSize: text?.length ?? 0 }, { apiKeyHash: 'hash' }, 'https://hooks.test/x');
    const claimed = await jobs.claim('w1');
    if (!claimed) throw new Error('nothing to claim');
    return claimed;
  }

  beforeEach(() => {
    db = new MemoryDatabaseClient({ maxRetries: 3 });
    jobs = new JobRepository(db);
    store = new MemoryContentStore();
    enqueue = vi.fn<(job: Job) => boolean>(() => true);
    files = new Map();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('completes a job with a published artifact and queues its webhook', async () => {
    const engine = new ScriptedEngine([ENGINE_OUTPUT]);
    const job = await claimNew();

    const result = await createJobProcessor(deps(engine))(job, 'w1');

    expect(result?.status).toBe('completed');
    expect(result?.modelUsed).toBe('test-model');
    expect(result?.parsedJson?.['territory']).toBe('India');
    expect(result?.parsedJson?.['signatories']).toBeNull();
    expect(store.blobs.has(result?.ipfsCid ?? '')).toBe(true);
    expect(result?.encryptionKey).toEqual(expect.any(String));
    expect(engine.prompts[0]?.prompt).toContain(AGREEMENT);
    expect(enqueue).toHaveBeenCalledTimes(1);
    expect(enqueue.mock.calls[0]?.[0].id).toBe(job.id);
  });

  it('fails without retry when the text is too short', async () => {
    const engine = new ScriptedEngine([ENGINE_OUTPUT]);
    const job = await claimNew('tiny.txt', 'too short');

    const result = await createJobProcessor(deps(engine))(job, 'w1');

    expect(result?.status).toBe('failed');
    expect(result?.retryCount).toBe(0);
    expect(result?.errorMessage).toBe(
      'Extracted text too short (9 < 20 characters); the document may be scanned or empty'
    );
    expect(engine.calls).toBe(0);
    expect(enqueue).toHaveBeenCalledTimes(1);
  });

  it('fails without retry when the stored file is gone', async () => {
    const job = await claimNew('gone.txt', null);
    const result = await createJobProcessor(deps(new ScriptedEngine([ENGINE_OUTPUT])))(job, 'w1');

    expect(result?.status).toBe('failed');
    expect(result?.errorMessage).toBe(
      "Stored file for gone.txt is unreadable: ENOENT: no such file, open '/uploads/gone.txt'"
    );
  });

  it('retries when the stored file cannot be read for a transient reason', async () => {
    const engine = new ScriptedEngine([ENGINE_OUTPUT]);
    const job = await claimNew();
    const readFile = async (path: string): Promise<Buffer> => {
      throw Object.assign(new Error(`EMFILE: too many open files, open '${path}'`), { code: 'EMFILE' });
    };

    const result = await createJobProcessor(deps(engine, { readFile }))(job, 'w1');

    expect(result?.status).toBe('pending');
    expect(result?.retryCount).toBe(1);
    expect(result?.errorMessage).toBe("EMFILE: too many open files, open '/uploads/deal.txt'");
    expect(engine.calls).toBe(0);
    expect(enqueue).not.toHaveBeenCalled();
  });

  it('returns the job to pending when extraction is exhausted', async () => {
    const engine = new ScriptedEngine(['not json']);
    const job = await claimNew();

    const result = await createJobProcessor(deps(engine))(job, 'w1');

    expect(engine.calls).toBe(2);
    expect(result?.status).toBe('pending');
    expect(result?.retryCount).toBe(1);
    expect(result?.errorMessage).toMatch(/^Extraction failed after 2 attempt\(s\)/);
    expect(enqueue).not.toHaveBeenCalled();
  });

  it('retries publish failures at job level', async () => {
    store.failWith = new Error('node is offline');
    const job = await claimNew();

    const result = await createJobProcessor(deps(new ScriptedEngine([ENGINE_OUTPUT])))(job, 'w1');

    expect(result?.status).toBe('pending');
    expect(result?.errorMessage).toBe('Publishing artifact for job ' + job.id + ' to memory failed: node is offline');
  });

  it('discards the result when the claim moved to another worker', async () => {
    const job = await claimNew();
    const processor = createJobProcessor(
      deps(new ScriptedEngine([ENGINE_OUTPUT]), {
        orchestrator: {
          modelId: 'test-model',
          extract: async () => {
            await db.failJob(job.id, 'w1', 'processing timed out', true);
            await db.claimJob('w2');
            return { data: { territory: 'India' }, modelId: 'test-model', attempts: 1, durationMs: 1, missingFields: [] };
          }
        }
      })
    );

    await expect(processor(job, 'w1')).resolves.toBeNull();
    const current = await db.getJobById(job.id);
    expect(current?.status).toBe('processing');
    expect(current?.claimedBy).toBe('w2');
    expect(enqueue).not.toHaveBeenCalled();
  });
});

/**
 * One job, start to finish: stored file → text → extraction → published
 * artifact → `complete`. Any error becomes a `fail` whose retryable flag comes
 * from the error's class. Terminal jobs are handed to the webhook dispatcher.
 */
import { readFile } from 'node:fs/promises';

import { createLogger, errorMessage } from '@rights-parser/shared';
import { ClaimLostError, InvalidTransitionError, isTerminal, type Job, type JobRepository } from '@rights-parser/database';

import type { ExtractionOrchestrator } from '../services/extraction/orchestrator';
import { LlmError } from '../services/llm/client';
import type { ArtifactPublisher } from '../services/storage/publisher';
import { TextExtractionError, mimeTypeFromPath, type TextExtractor } from '../services/text';
import type { WebhookDispatcher } from '../services/webhooks/dispatcher';

const log = createLogger('worker');

export interface JobProcessorDeps {
  jobs: JobRepository;
  textExtractor: TextExtractor;
  orchestrator: Pick<ExtractionOrchestrator, 'extract' | 'modelId'>;
  publisher: Pick<ArtifactPublisher, 'publish'>;
  webhooks: Pick<WebhookDispatcher, 'enqueue'>;
  /** Converted text shorter than this fails the job without retry */
  minTextLength: number;
  readFile?: (path: string) => Promise<Buffer>;
}

/** Returns the job as it was left, or null when the claim was lost midway. */
export type JobProcessor = (job: Job, workerId: string) => Promise<Job | null>;

/**
 * Whether a failed attempt is worth another claim. Problems with the document
 * itself and rejected engine credentials are not; engine, network and
 * publishing trouble is.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof TextExtractionError) return false;
  if (err instanceof LlmError) return err.transient;
  // ExtractionExhaustedError, PublishError, network and store errors
  return true;
}

/** Read errors that will not go away on another attempt. */
const MISSING_FILE_CODES = new Set(['ENOENT', 'EISDIR', 'ENOTDIR']);

async function loadDocument(job: Job, read: (path: string) => Promise<Buffer>): Promise<Buffer> {
  try {
    return await read(job.filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string' && MISSING_FILE_CODES.has(err.code)) {
      throw new TextExtractionError(`Stored file for ${job.fileName} is unreadable: ${err.message}`);
    }
    throw err;
  }
}

export function createJobProcessor(deps: JobProcessorDeps): JobProcessor {
  const read = deps.readFile ?? ((path: string) => readFile(path));

  const settle = (job: Job) => {
    if (isTerminal(job.status)) {
      deps.webhooks.enqueue(job);
    }
    return job;
  };

  return async (job, workerId) => {
    const jobLog = log.child({ jobId: job.id, workerId });
    const t0 = Date.now();

    try {
      const buffer = await loadDocument(job, read);
      const { text, pages, format } = await deps.textExtractor.extract({
        buffer,
        fileName: job.fileName,
        mimeType: mimeTypeFromPath(job.filePath)
      });
      if (text.length < deps.minTextLength) {
        throw new TextExtractionError(
          `Extracted text too short (${text.length} < ${deps.minTextLength} characters); the document may be scanned or empty`
        );
      }
      jobLog.info('Document converted', { format, pages, chars: text.length });

      const result = await deps.orchestrator.extract(text, { jobId: job.id });
      const artifact = await deps.publisher.publish(result.data, {
        jobId: job.id,
        fileName: job.fileName,
        modelUsed: result.modelId
      });

      const completed = await deps.jobs.complete(job.id, workerId, {
        ipfsCid: artifact.cid,
        encryptionKey: artifact.encryptionKey,
        parsedJson: result.data,
        modelUsed: result.modelId
      });
      jobLog.info('Job completed', {
        cid: artifact.cid,
        attempts: result.attempts,
        missingFields: result.missingFields,
        durationMs: Date.now() - t0
      });
      return settle(completed);
    } catch (err) {
      if (err instanceof ClaimLostError || err instanceof InvalidTransitionError) {
        jobLog.warn('Claim lost while processing; result discarded', { error: err.message });
        return null;
      }

      const retryable = isRetryable(err);
      const message = errorMessage(err);
      let failed: Job;
      try {
        failed = await deps.jobs.fail(job.id, workerId, message, retryable);
      } catch (failErr) {
        if (failErr instanceof ClaimLostError || failErr instanceof InvalidTransitionError) {
          jobLog.warn('Claim lost before failure was recorded', { error: failErr.message, cause: message });
          return null;
        }
        throw failErr;
      }
      jobLog.warn('Job attempt failed', {
        error: message,
        errorType: err instanceof Error ? err.name : typeof err,
        retryable,
        status: failed.status,
        retryCount: failed.retryCount,
        durationMs: Date.now() - t0
      });
      return settle(failed);
    }
  };
}

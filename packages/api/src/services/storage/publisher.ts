/**
 * Artifact publisher: serialize a completed payload, encrypt it and push it to
 * the content store. The job cannot complete without the returned CID, so any
 * failure here is a (retryable) job failure.
 */
import { createLogger, errorMessage } from '@rights-parser/shared';

import { encryptArtifact } from './encryption';
import type { ContentStore } from './ipfs';

const log = createLogger('publisher');

export class PublishError extends Error {
  jobId: string;
  provider: string;

  constructor(jobId: string, provider: string, cause: unknown) {
    super(`Publishing artifact for job ${jobId} to ${provider} failed: ${errorMessage(cause)}`);
    this.name = 'PublishError';
    this.jobId = jobId;
    this.provider = provider;
  }
}

export interface PublishedArtifact {
  cid: string;
  /** Base64 AES-256-GCM key */
  encryptionKey: string;
  bytes: number;
}

export interface ArtifactMetadata {
  jobId: string;
  fileName: string;
  modelUsed: string;
}

export class ArtifactPublisher {
  constructor(private readonly store: ContentStore) {}

  /**
   * The artifact wraps the payload with its provenance so a consumer holding only
   * the CID and key can tell what it is looking at.
   *
   * @throws {PublishError}
   */
  async publish(payload: Record<string, unknown>, meta: ArtifactMetadata): Promise<PublishedArtifact> {
    const document = JSON.stringify({
      job_id: meta.jobId,
      file_name: meta.fileName,
      model_used: meta.modelUsed,
      published_at: new Date().toISOString(),
      parsed_json: payload
    });
    const { data, key } = encryptArtifact(document);

    let cid: string;
    try {
      cid = await this.store.add(data, `${meta.jobId}.json.enc`);
    } catch (err) {
      throw new PublishError(meta.jobId, this.store.provider, err);
    }
    log.info('Artifact published', { jobId: meta.jobId, cid, provider: this.store.provider, bytes: data.length });
    return { cid, encryptionKey: key, bytes: data.length };
  }
}

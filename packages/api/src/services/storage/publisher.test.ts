import { describe, expect, it, vi } from 'vitest';

import { MemoryContentStore } from '../../testing/fakes';
import { decryptArtifact } from './encryption';
import { ArtifactPublisher, PublishError } from './publisher';

describe('ArtifactPublisher', () => {
  it('stores an encrypted document that opens with the returned key', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const store = new MemoryContentStore();
    const publisher = new ArtifactPublisher(store);

    const artifact = await publisher.publish(
      { territory: 'India' },
      { jobId: 'job-1', fileName: 'deal.pdf', modelUsed: 'test-model' }
    );

    const sealed = await store.cat(artifact.cid);
    expect(artifact.bytes).toBe(sealed.length);
    const document: unknown = JSON.parse(decryptArtifact(sealed, artifact.encryptionKey).toString('utf8'));
    expect(document).toMatchObject({
      job_id: 'job-1',
      file_name: 'deal.pdf',
      model_used: 'test-model',
      parsed_json: { territory: 'India' }
    });
  });

  it('wraps store failures in PublishError', async () => {
    const store = new MemoryContentStore();
    store.failWith = new Error('node is offline');

    await expect(
      new ArtifactPublisher(store).publish({ a: 1 }, { jobId: 'job-2', fileName: 'x.txt', modelUsed: 'm' })
    ).rejects.toThrowError(PublishError);
    await expect(
      new ArtifactPublisher(store).publish({ a: 1 }, { jobId: 'job-2', fileName: 'x.txt', modelUsed: 'm' })
    ).rejects.toThrowError('Publishing artifact for job job-2 to memory failed: node is offline');
  });
});

/**
 * API package entry point.
 *
 * The package hosts the HTTP surface and the processing side of the pipeline
 * (worker pool, extraction, artifact publishing, webhooks); `server.ts` wires
 * them together in one process.
 */

/**
 * Current API version. Reported by the health endpoints.
 */
export const API_VERSION = '1.0.0';

export interface ApiInfo {
  name: string;
  version: string;
  status: 'healthy' | 'degraded' | 'down';
}

/**
 * @example
 * ```typescript
 * const info = getApiInfo();
 * console.log(`${info.name} v${info.version} is ${info.status}`);
 * // "rights-parser-api v1.0.0 is healthy"
 * ```
 */
export function getApiInfo(status: ApiInfo['status'] = 'healthy'): ApiInfo {
  return {
    name: 'rights-parser-api',
    version: API_VERSION,
    status
  };
}

export { createApp, type AppDeps } from './app';
export { WorkerPool, type WorkerPoolOptions } from './workers/pool';
export { createJobProcessor, isRetryable, type JobProcessor, type JobProcessorDeps } from './workers/process-job';
export { ExtractionOrchestrator, ExtractionExhaustedError, ExtractionFailure } from './services/extraction/orchestrator';
export { createAzureEngine, LlmError, type ExtractionEngine } from './services/llm/client';
export { ArtifactPublisher, PublishError } from './services/storage/publisher';
export { decryptArtifact, encryptArtifact } from './services/storage/encryption';
export { getContentStore, type ContentStore } from './services/storage/ipfs';
export { createTextExtractor, TextExtractionError } from './services/text';
export { WebhookDispatcher, buildWebhookPayload } from './services/webhooks/dispatcher';
export { hashApiKey } from './middleware/auth';

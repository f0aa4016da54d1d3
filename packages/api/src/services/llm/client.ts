/**
 * @fileoverview Extraction Engine Client
 *
 * Azure OpenAI text generation through the AI SDK. The engine is consumed as a
 * text-in/text-out function: it receives a prompt and returns whatever text the
 * model produced. Parsing and validating that text is the orchestrator's job.
 *
 * Key Features:
 * - Azure OpenAI integration via the `@ai-sdk/azure` provider
 * - Error categorization (VALIDATION, AUTH, QUOTA, TIMEOUT, SERVER)
 * - Per-call AbortSignal so the caller owns the timeout
 * - Optional Langfuse generation span per call
 * - Test seams for unit testing without external dependencies
 */

import { createAzure } from '@ai-sdk/azure';
import { generateText } from 'ai';

import { clipUnknown, createLogger, errorMessage } from '@rights-parser/shared';

import { langfuse } from '../../instrumentation';

const log = createLogger('llm');

/**
 * Categories of engine errors. QUOTA, TIMEOUT and SERVER are transient.
 */
export type LlmErrorCategory = 'VALIDATION' | 'AUTH' | 'QUOTA' | 'TIMEOUT' | 'SERVER';

export class LlmError extends Error {
  category: LlmErrorCategory;
  statusCode?: number;
  provider?: string;
  /** Original error message from underlying cause */
  causeMessage?: string;

  constructor(options: {
    message: string;
    category: LlmErrorCategory;
    statusCode?: number;
    provider?: string;
    cause?: unknown;
  }) {
    super(options.message);
    this.name = 'LlmError';
    this.category = options.category;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
    if (options.provider !== undefined) this.provider = options.provider;
    if (options.cause instanceof Error) this.causeMessage = options.cause.message;
  }

  get transient(): boolean {
    return this.category === 'QUOTA' || this.category === 'TIMEOUT' || this.category === 'SERVER';
  }

  toJSON() {
    return {
      name: 'LlmError',
      message: this.message,
      category: this.category,
      statusCode: this.statusCode,
      provider: this.provider
    } as const;
  }
}

export interface LlmClientConfig {
  deployment: string;
  resourceName: string;
  apiKey: string;
  apiVersion: string;
}

/**
 * Read the Azure OpenAI settings from the environment.
 *
 * @throws {LlmError} VALIDATION when a required variable is missing
 *
 * @example
 * ```typescript
 * const { modelId, config } = getLlmClient();
 * ```
 */
export function getLlmClient(env: Record<string, string | undefined> = process.env): {
  modelId: string;
  config: LlmClientConfig;
} {
  const resourceName = env['AZURE_RESOURCE_NAME']?.trim();
  const apiKey = env['AZURE_OPENAI_API_KEY']?.trim();
  const deployment = env['AZURE_OPENAI_DEPLOYMENT']?.trim();
  const apiVersion = env['AZURE_OPENAI_API_VERSION']?.trim() || '2024-12-01-preview';

  if (resourceName && apiKey && deployment) {
    return { modelId: deployment, config: { deployment, resourceName, apiKey, apiVersion } };
  }

  throw new LlmError({
    message: 'Missing required env: AZURE_RESOURCE_NAME, AZURE_OPENAI_API_KEY and AZURE_OPENAI_DEPLOYMENT',
    category: 'VALIDATION'
  });
}

function mapStatusToCategory(status: number): LlmErrorCategory {
  if (status === 400) return 'VALIDATION';
  if (status === 401 || status === 403) return 'AUTH';
  if (status === 429) return 'QUOTA';
  return 'SERVER';
}

function readStatus(err: object): number | undefined {
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

/**
 * Normalize anything the AI SDK or fetch throws into an LlmError.
 */
export function mapError(err: unknown, provider = 'azure_openai'): LlmError {
  if (err instanceof LlmError) return err;
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new LlmError({ message: 'Timeout/abort', category: 'TIMEOUT', provider, cause: err });
  }
  if (err !== null && typeof err === 'object') {
    const status = readStatus(err);
    if (status !== undefined) {
      const message = err instanceof Error && err.message.length > 0 ? err.message : `HTTP ${status}`;
      return new LlmError({ message, category: mapStatusToCategory(status), statusCode: status, provider, cause: err });
    }
  }
  // Status may only be embedded in the message text
  const message = errorMessage(err) || 'Unknown LLM error';
  let category: LlmErrorCategory = 'SERVER';
  if (/\b400\b/.test(message)) category = 'VALIDATION';
  else if (/\b(401|403)\b/.test(message)) category = 'AUTH';
  else if (/\b429\b/.test(message)) category = 'QUOTA';
  return new LlmError({ message, category, provider, cause: err });
}

export interface EnginePrompt {
  system: string;
  prompt: string;
}

export interface EngineOutput {
  text: string;
  usage?: { promptTokens?: number; completionTokens?: number; totalTokens?: number };
}

/**
 * Text-in/text-out extraction engine. Implementations must reject with an
 * LlmError and honour `signal`.
 */
export interface ExtractionEngine {
  /** Pinned model identifier recorded on completed jobs */
  readonly modelId: string;
  generate(input: EnginePrompt, options: { signal: AbortSignal; traceId?: string }): Promise<EngineOutput>;
}

/**
 * Azure OpenAI engine. The AI SDK's own retries are disabled; attempts are
 * counted by the orchestrator.
 */
export function createAzureEngine(env: Record<string, string | undefined> = process.env): ExtractionEngine {
  const { modelId, config } = getLlmClient(env);
  const azure = createAzure({
    resourceName: config.resourceName,
    apiKey: config.apiKey,
    apiVersion: config.apiVersion
  });
  const model = azure(config.deployment);
  const provider = 'azure_openai';

  return {
    modelId,
    async generate(input, options) {
      const t0 = Date.now();
      const generation = langfuse?.generation({
        name: 'agreement-extraction',
        model: modelId,
        modelParameters: { provider, maxTokens: 4096 },
        input: [
          { role: 'system', content: input.system },
          { role: 'user', content: input.prompt }
        ],
        metadata: { jobId: options.traceId }
      });

      try {
        const result = await __aiFns.generateText({
          model,
          system: input.system,
          prompt: input.prompt,
          temperature: 0.1,
          maxTokens: 4096,
          maxRetries: 0,
          abortSignal: options.signal
        });
        const usage = {
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
          totalTokens: result.usage.totalTokens
        };
        generation?.end({ output: result.text, usage, statusMessage: 'success' });
        // Sizes only; prompt and output carry agreement contents
        log.info('Engine call completed', {
          provider,
          model: modelId,
          durationMs: Date.now() - t0,
          outputChars: result.text.length,
          tokens: usage.totalTokens
        });
        return { text: result.text, usage };
      } catch (e) {
        const err = mapError(e, provider);
        log.warn('Engine call failed', {
          provider,
          model: modelId,
          durationMs: Date.now() - t0,
          category: err.category,
          statusCode: err.statusCode ?? null,
          error: clipUnknown(err.message, 500)
        });
        generation?.end({
          level: 'ERROR',
          statusMessage: `${err.category}: ${err.message}`,
          metadata: { errorCategory: err.category, statusCode: err.statusCode }
        });
        throw err;
      }
    }
  };
}

// Test seam for injecting AI SDK functions in unit tests without ESM namespace spying
export type GenerateTextFn = (args: Parameters<typeof generateText>[0]) => Promise<{
  text: string;
  usage: { promptTokens: number; completionTokens: number; totalTokens: number };
}>;

type AiFns = {
  generateText: GenerateTextFn;
};

let __aiFns: AiFns = { generateText };

export function __setAiFns(fns: Partial<AiFns>) {
  __aiFns = { ...__aiFns, ...fns };
}

export function __resetAiFns() {
  __aiFns = { generateText };
}

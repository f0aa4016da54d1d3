/**
 * @fileoverview Extraction Orchestrator
 *
 * Drives agreement text through the extraction engine and turns whatever text
 * comes back into a validated payload:
 *
 * 1. Truncate the source text and build the prompt
 * 2. Call the engine with a per-attempt timeout
 * 3. Clean the output (code fences, prose around the object), optionally repair it
 * 4. Require one non-empty JSON object; fill missing required sections with null
 * 5. Normalize date-valued fields
 *
 * A failed step is an ExtractionFailure for that attempt. Attempts repeat with a
 * fresh engine call up to `maxAttempts`; after that ExtractionExhaustedError is
 * thrown. These attempts are independent of the job-level retry count.
 */

import { jsonrepair } from 'jsonrepair';

import { clipString, createLogger, errorMessage, type AppConfig } from '@rights-parser/shared';

import { LlmError, mapError, type ExtractionEngine } from '../llm/client';
import { buildRightsAgreementPrompt } from '../llm/prompts/rights-agreement';
import {
  ParsedAgreementSchema,
  missingFields,
  withRequiredFields,
  type ParsedAgreement,
  type RequiredField
} from '../llm/schemas/rights-agreement';
import { normalizeDates } from './dates';

const log = createLogger('extraction');

export type ExtractionFailureReason = 'ENGINE' | 'TIMEOUT' | 'PARSE' | 'INVALID';

/**
 * One attempt's failure. Absorbed by the retry loop.
 */
export class ExtractionFailure extends Error {
  reason: ExtractionFailureReason;
  attempt: number;
  /** Leading part of the engine output, when there was one */
  outputPreview: string | null;

  constructor(options: { message: string; reason: ExtractionFailureReason; attempt: number; output?: string }) {
    super(options.message);
    this.name = 'ExtractionFailure';
    this.reason = options.reason;
    this.attempt = options.attempt;
    this.outputPreview = options.output === undefined ? null : clipString(options.output, 300);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      reason: this.reason,
      attempt: this.attempt
    } as const;
  }
}

export class ExtractionExhaustedError extends Error {
  attempts: number;
  lastFailure: ExtractionFailure;

  constructor(attempts: number, lastFailure: ExtractionFailure) {
    super(`Extraction failed after ${attempts} attempt(s): ${lastFailure.message}`);
    this.name = 'ExtractionExhaustedError';
    this.attempts = attempts;
    this.lastFailure = lastFailure;
  }
}

export interface ExtractionResult {
  data: ParsedAgreement;
  modelId: string;
  attempts: number;
  durationMs: number;
  /** Required sections the engine left out (now null in `data`) */
  missingFields: RequiredField[];
}

export type OrchestratorOptions = AppConfig['extraction'];

export interface OrchestratorDeps {
  sleep?: (ms: number) => Promise<void>;
}

function jitter(base: number, spread = 200) {
  return base + Math.floor(Math.random() * Math.min(spread, base));
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Strip markdown fences and surrounding prose, keeping the outermost `{…}`.
 *
 * @example
 * cleanEngineOutput('Here is the JSON:\n```json\n{"a":1}\n```'); // '{"a":1}'
 */
export function cleanEngineOutput(raw: string): string {
  let text = raw.trim();
  const fenced = /```[A-Za-z]*\s*([\s\S]*?)```/.exec(text);
  if (fenced?.[1] !== undefined) {
    text = fenced[1].trim();
  }
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    text = text.slice(start, end + 1);
  }
  return text;
}

/**
 * Parse cleaned engine output into a non-empty object.
 *
 * @throws {ExtractionFailure} PARSE when the text is not JSON, INVALID when it is
 * JSON but not a non-empty object
 */
export function parseEngineOutput(raw: string, options: { repairJson: boolean; attempt: number }): Record<string, unknown> {
  const cleaned = cleanEngineOutput(raw);
  let value: unknown;
  try {
    value = JSON.parse(cleaned);
  } catch (err) {
    if (!options.repairJson) {
      throw new ExtractionFailure({
        message: `Engine output is not valid JSON: ${errorMessage(err)}`,
        reason: 'PARSE',
        attempt: options.attempt,
        output: raw
      });
    }
    try {
      value = JSON.parse(jsonrepair(cleaned));
    } catch (repairErr) {
      throw new ExtractionFailure({
        message: `Engine output is not valid JSON (repair failed: ${errorMessage(repairErr)})`,
        reason: 'PARSE',
        attempt: options.attempt,
        output: raw
      });
    }
  }

  const parsed = ParsedAgreementSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues[0]?.message ?? 'not an object';
    throw new ExtractionFailure({
      message: `Engine output is not a non-empty JSON object: ${detail}`,
      reason: 'INVALID',
      attempt: options.attempt,
      output: raw
    });
  }
  return parsed.data;
}

export class ExtractionOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly engine: ExtractionEngine,
    private readonly options: OrchestratorOptions,
    deps: OrchestratorDeps = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get modelId(): string {
    return this.engine.modelId;
  }

  /**
   * Extract the deal terms from agreement text.
   *
   * @throws {ExtractionExhaustedError} every attempt failed
   * @throws {LlmError} the engine rejected the request outright (AUTH, VALIDATION)
   */
  async extract(text: string, context: { jobId?: string; signal?: AbortSignal } = {}): Promise<ExtractionResult> {
    const t0 = Date.now();
    const source = text.length > this.options.maxInputChars ? text.slice(0, this.options.maxInputChars) : text;
    if (source.length < text.length) {
      log.info('Truncated agreement text', { jobId: context.jobId, from: text.length, to: source.length });
    }
    const prompt = buildRightsAgreementPrompt(source);
    const maxAttempts = Math.max(1, this.options.maxAttempts);

    let lastFailure: ExtractionFailure | null = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      context.signal?.throwIfAborted();
      if (attempt > 1) {
        await this.sleep(jitter(this.options.backoffMs * (attempt - 1)));
      }

      try {
        const output = await this.callWithTimeout(prompt, attempt, context);
        const obj = parseEngineOutput(output, { repairJson: this.options.repairJson, attempt });
        const missing = missingFields(obj);
        const normalized = normalizeDates(withRequiredFields(obj));
        const data = ParsedAgreementSchema.parse(normalized);

        log.info('Extraction succeeded', {
          jobId: context.jobId,
          attempt,
          missingFields: missing,
          durationMs: Date.now() - t0
        });
        return { data, modelId: this.engine.modelId, attempts: attempt, durationMs: Date.now() - t0, missingFields: missing };
      } catch (err) {
        if (!(err instanceof ExtractionFailure)) throw err;
        lastFailure = err;
        log.warn('Extraction attempt failed', {
          jobId: context.jobId,
          attempt,
          maxAttempts,
          reason: err.reason,
          error: err.message,
          outputPreview: err.outputPreview
        });
      }
    }

    throw new ExtractionExhaustedError(
      maxAttempts,
      lastFailure ?? new ExtractionFailure({ message: 'no attempt made', reason: 'ENGINE', attempt: 0 })
    );
  }

  /**
   * One engine call bounded by `attemptTimeoutMs`. Transient engine errors become
   * ExtractionFailures; the rest propagate.
   */
  private async callWithTimeout(
    prompt: ReturnType<typeof buildRightsAgreementPrompt>,
    attempt: number,
    context: { jobId?: string; signal?: AbortSignal }
  ): Promise<string> {
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort(context.signal?.reason);
    context.signal?.addEventListener('abort', onOuterAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new ExtractionFailure({
          message: `Engine call timed out after ${this.options.attemptTimeoutMs}ms`,
          reason: 'TIMEOUT',
          attempt
        });
        controller.abort(err);
        reject(err);
      }, this.options.attemptTimeoutMs);
    });

    try {
      // The race also covers an engine that ignores the signal
      const output = await Promise.race([
        this.engine.generate(prompt, { signal: controller.signal, traceId: context.jobId }),
        timedOut
      ]);
      return output.text;
    } catch (err) {
      if (err instanceof ExtractionFailure) throw err;
      if (context.signal?.aborted) throw context.signal.reason;
      const llmErr = err instanceof LlmError ? err : mapError(err);
      if (!llmErr.transient) throw llmErr;
      throw new ExtractionFailure({
        message: `Engine error (${llmErr.category}): ${llmErr.message}`,
        reason: llmErr.category === 'TIMEOUT' ? 'TIMEOUT' : 'ENGINE',
        attempt
      });
    } finally {
      clearTimeout(timer);
      context.signal?.removeEventListener('abort', onOuterAbort);
    }
  }
}

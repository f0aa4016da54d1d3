/**
 * In-process stand-ins for the pipeline's external collaborators, shared by
 * the test suites.
 */
import { createHash } from 'node:crypto';

import type { EngineOutput, EnginePrompt, ExtractionEngine } from '../services/llm/client';
import type { ContentStore } from '../services/storage/ipfs';

/**
 * Content store keeping blobs in a Map, keyed by a sha-256 derived id.
 */
export class MemoryContentStore implements ContentStore {
  readonly provider = 'memory';
  readonly blobs = new Map<string, Buffer>();
  /** Set to make the next `add` calls reject */
  failWith: Error | null = null;
  healthy = true;

  async add(data: Buffer, _fileName: string): Promise<string> {
    if (this.failWith) throw this.failWith;
    const cid = `bafy${createHash('sha256').update(data).digest('hex').slice(0, 32)}`;
    this.blobs.set(cid, Buffer.from(data));
    return cid;
  }

  async cat(cid: string): Promise<Buffer> {
    const blob = this.blobs.get(cid);
    if (!blob) throw new Error(`no blob ${cid}`);
    return Buffer.from(blob);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export type EngineStep = string | Error | ((input: EnginePrompt) => string);

/**
 * Engine that replays `steps` in order, repeating the last one.
 */
export class ScriptedEngine implements ExtractionEngine {
  readonly modelId: string;
  readonly prompts: EnginePrompt[] = [];

  constructor(
    private readonly steps: EngineStep[],
    modelId = 'test-model'
  ) {
    this.modelId = modelId;
  }

  get calls(): number {
    return this.prompts.length;
  }

  async generate(input: EnginePrompt): Promise<EngineOutput> {
    const step = this.steps[Math.min(this.prompts.length, this.steps.length - 1)];
    this.prompts.push(input);
    if (step === undefined) return { text: '' };
    if (step instanceof Error) throw step;
    return { text: typeof step === 'function' ? step(input) : step };
  }
}

export const immediate = async (_ms: number): Promise<void> => {};

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  LlmError,
  __resetAiFns,
  __setAiFns,
  createAzureEngine,
  getLlmClient,
  mapError,
  type GenerateTextFn
} from './client';

const ENV = {
  AZURE_RESOURCE_NAME: 'example-resource',
  AZURE_OPENAI_API_KEY: 'test-key',
  AZURE_OPENAI_DEPLOYMENT: 'gpt-4o-mini'
};

const USAGE = { promptTokens: 10, completionTokens: 5, totalTokens: 15 };

describe('getLlmClient', () => {
  it('fails fast when required env is missing', () => {
    expect(() => getLlmClient({ AZURE_RESOURCE_NAME: 'example-resource' })).toThrowError(LlmError);
    try {
      getLlmClient({});
    } catch (e) {
      expect(e).toBeInstanceOf(LlmError);
      if (e instanceof LlmError) expect(e.category).toBe('VALIDATION');
    }
  });

  it('pins the deployment as the model id and defaults the API version', () => {
    const { modelId, config } = getLlmClient(ENV);
    expect(modelId).toBe('gpt-4o-mini');
    expect(config.apiVersion).toBe('2024-12-01-preview');
  });
});

describe('mapError', () => {
  it('maps abort and timeout errors to TIMEOUT', () => {
    const err = Object.assign(new Error('Aborted'), { name: 'AbortError' });
    expect(mapError(err).category).toBe('TIMEOUT');
    expect(mapError(err).transient).toBe(true);
  });

  it('maps HTTP status codes', () => {
    expect(mapError(Object.assign(new Error('bad'), { statusCode: 400 })).category).toBe('VALIDATION');
    expect(mapError(Object.assign(new Error('no'), { status: 401 })).category).toBe('AUTH');
    expect(mapError(Object.assign(new Error('slow down'), { statusCode: 429 })).category).toBe('QUOTA');
    expect(mapError(Object.assign(new Error('boom'), { statusCode: 503 })).category).toBe('SERVER');
  });

  it('falls back to status codes embedded in the message', () => {
    const err = mapError(new Error('Request failed with status 403'));
    expect(err.category).toBe('AUTH');
    expect(err.transient).toBe(false);
  });
});

describe('createAzureEngine', () => {
  afterEach(() => {
    __resetAiFns();
    vi.restoreAllMocks();
  });

  it('returns the generated text and usage, disabling SDK retries', async () => {
    const spy = vi.fn<GenerateTextFn>(async () => ({ text: '{"parties":[]}', usage: USAGE }));
    __setAiFns({ generateText: spy });
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const engine = createAzureEngine(ENV);
    const out = await engine.generate({ system: 'sys', prompt: 'agreement' }, { signal: new AbortController().signal });

    expect(engine.modelId).toBe('gpt-4o-mini');
    expect(out).toEqual({ text: '{"parties":[]}', usage: USAGE });
    const args = spy.mock.calls[0]?.[0];
    expect(args?.maxRetries).toBe(0);
    expect(args?.system).toBe('sys');
    expect(args?.prompt).toBe('agreement');
  });

  it('passes the abort signal through and maps the rejection', async () => {
    __setAiFns({
      generateText: vi.fn<GenerateTextFn>(
        args =>
          new Promise((_resolve, reject) => {
            args.abortSignal?.addEventListener(
              'abort',
              () => reject(Object.assign(new Error('Aborted'), { name: 'AbortError' })),
              { once: true }
            );
          })
      )
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const controller = new AbortController();
    const pending = createAzureEngine(ENV).generate({ system: 's', prompt: 'p' }, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'LlmError', category: 'TIMEOUT' });
  });

  it('logs sizes without leaking content', async () => {
    __setAiFns({ generateText: vi.fn<GenerateTextFn>(async () => ({ text: 'SECRET-TERMS', usage: USAGE })) });
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await createAzureEngine(ENV).generate(
      { system: 'sys', prompt: 'CONFIDENTIAL-AGREEMENT' },
      { signal: new AbortController().signal }
    );

    const lines = logSpy.mock.calls.map(call => String(call[0]));
    const completed = lines.find(line => line.includes('Engine call completed'));
    expect(completed).toBeDefined();
    expect(completed).not.toContain('SECRET-TERMS');
    expect(completed).not.toContain('CONFIDENTIAL-AGREEMENT');
    expect(completed).toContain('"outputChars":12');
  });
});

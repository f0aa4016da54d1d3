/**
 * Content-addressed store clients.
 *
 * Two providers behind one interface: a local IPFS node's HTTP API and the
 * Pinata pinning service. `getContentStore()` picks Pinata when a JWT is
 * configured, the local node otherwise.
 */
import { z } from 'zod';

import { clipString, createLogger, errorMessage, type AppConfig } from '@rights-parser/shared';

const log = createLogger('content-store');

export const PINATA_API_URL = 'https://api.pinata.cloud';
export const PINATA_GATEWAY_URL = 'https://gateway.pinata.cloud';

export class ContentStoreError extends Error {
  provider: string;
  statusCode?: number;

  constructor(options: { message: string; provider: string; statusCode?: number }) {
    super(options.message);
    this.name = 'ContentStoreError';
    this.provider = options.provider;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
  }
}

export interface ContentStore {
  readonly provider: string;
  /** Store bytes and return their content identifier. */
  add(data: Buffer, fileName: string): Promise<string>;
  cat(cid: string): Promise<Buffer>;
  healthCheck(): Promise<boolean>;
}

export type FetchFn = typeof fetch;

const IpfsAddResponse = z.object({ Hash: z.string().min(1) });
const PinataPinResponse = z.object({ IpfsHash: z.string().min(1) });

interface HttpStoreOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
}

abstract class HttpContentStore implements ContentStore {
  abstract readonly provider: string;
  protected readonly fetchFn: FetchFn;
  protected readonly timeoutMs: number;

  constructor(options: HttpStoreOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs;
  }

  abstract add(data: Buffer, fileName: string): Promise<string>;
  abstract cat(cid: string): Promise<Buffer>;
  abstract healthCheck(): Promise<boolean>;

  protected async request(url: string, init: RequestInit, action: string): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new ContentStoreError({ message: `${action} failed: ${errorMessage(err)}`, provider: this.provider });
    }
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new ContentStoreError({
        message: `${action} failed: HTTP ${res.status}${body ? ` - ${clipString(body, 300)}` : ''}`,
        provider: this.provider,
        statusCode: res.status
      });
    }
    return res;
  }

  protected async readJson<T>(res: Response, schema: z.ZodType<T>, action: string): Promise<T> {
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new ContentStoreError({ message: `${action}: response is not JSON (${errorMessage(err)})`, provider: this.provider });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ContentStoreError({ message: `${action}: unexpected response shape`, provider: this.provider });
    }
    return parsed.data;
  }

  protected form(data: Buffer, fileName: string): FormData {
    const form = new FormData();
    form.append('file', new Blob([data]), fileName);
    return form;
  }
}

/**
 * Local IPFS node (Kubo RPC API, e.g. http://localhost:5001).
 */
export class LocalIpfsStore extends HttpContentStore {
  readonly provider = 'ipfs';

  constructor(
    private readonly apiUrl: string,
    options: HttpStoreOptions
  ) {
    super(options);
  }

  async add(data: Buffer, fileName: string): Promise<string> {
    const res = await this.request(
      `${this.base()}/api/v0/add?pin=true`,
      { method: 'POST', body: this.form(data, fileName) },
      'IPFS upload'
    );
    const { Hash } = await this.readJson(res, IpfsAddResponse, 'IPFS upload');
    log.info('Uploaded to IPFS', { cid: Hash, bytes: data.length });
    return Hash;
  }

  async cat(cid: string): Promise<Buffer> {
    const res = await this.request(
      `${this.base()}/api/v0/cat?arg=${encodeURIComponent(cid)}`,
      { method: 'POST' },
      'IPFS fetch'
    );
    return Buffer.from(await res.arrayBuffer());
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request(`${this.base()}/api/v0/version`, { method: 'POST' }, 'IPFS version');
      return true;
    } catch (err) {
      log.warn('IPFS node unreachable', { error: errorMessage(err) });
      return false;
    }
  }

  private base(): string {
    return this.apiUrl.replace(/\/+$/, '');
  }
}

export class PinataStore extends HttpContentStore {
  readonly provider = 'pinata';
  private readonly apiUrl: string;
  private readonly gatewayUrl: string;

  constructor(
    private readonly jwt: string,
    options: HttpStoreOptions & { apiUrl?: string; gatewayUrl?: string }
  ) {
    super(options);
    this.apiUrl = options.apiUrl ?? PINATA_API_URL;
    this.gatewayUrl = options.gatewayUrl ?? PINATA_GATEWAY_URL;
  }

  async add(data: Buffer, fileName: string): Promise<string> {
    const res = await this.request(
      `${this.apiUrl}/pinning/pinFileToIPFS`,
      { method: 'POST', headers: { Authorization: `Bearer ${this.jwt}` }, body: this.form(data, fileName) },
      'Pinata upload'
    );
    const { IpfsHash } = await this.readJson(res, PinataPinResponse, 'Pinata upload');
    log.info('Pinned to Pinata', { cid: IpfsHash, bytes: data.length });
    return IpfsHash;
  }

  async cat(cid: string): Promise<Buffer> {
    const res = await this.request(`${this.gatewayUrl}/ipfs/${encodeURIComponent(cid)}`, { method: 'GET' }, 'Pinata fetch');
    return Buffer.from(await res.arrayBuffer());
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request(
        `${this.apiUrl}/data/testAuthentication`,
        { method: 'GET', headers: { Authorization: `Bearer ${this.jwt}` } },
        'Pinata auth check'
      );
      return true;
    } catch (err) {
      log.warn('Pinata authentication check failed', { error: errorMessage(err) });
      return false;
    }
  }
}

/**
 * Factory function to pick the configured content store provider.
 *
 * @example
 * ```typescript
 * const store = getContentStore(getConfig().contentStore);
 * const cid = await store.add(bytes, 'agreement.json.enc');
 * ```
 */
export function getContentStore(config: AppConfig['contentStore'], fetchFn?: FetchFn): ContentStore {
  const options: HttpStoreOptions = { timeoutMs: config.timeoutMs, ...(fetchFn ? { fetchFn } : {}) };
  if (config.pinataJwt) {
    return new PinataStore(config.pinataJwt, options);
  }
  return new LocalIpfsStore(config.ipfsApiUrl, options);
}

/**
 * API key gate with a per-key rolling-window rate limit.
 *
 * Keys arrive as `X-API-Key: <key>` or `Authorization: Bearer <key>` and are
 * looked up by sha-256 hash. Inactive and expired keys are refused without
 * touching any counter. For usable keys the window check, the request record
 * and the counter update are one store operation, so concurrent requests on
 * the same key cannot both take the last slot.
 */
import { createHash } from 'node:crypto';
import type { Request, RequestHandler } from 'express';

import { createLogger } from '@rights-parser/shared';
import { apiKeyState, type IApiKeyStore } from '@rights-parser/database';

import { ApiError, asyncHandler } from '../handlers/http';

const log = createLogger('auth');

export interface AuthGateOptions {
  keys: IApiKeyStore;
  windowMs: number;
  now?: () => Date;
}

export function hashApiKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

export function readApiKey(req: Request): string | null {
  const header = req.get('x-api-key')?.trim();
  if (header) return header;
  const bearer = /^Bearer\s+(.+)$/i.exec(req.get('authorization') ?? '');
  return bearer?.[1]?.trim() || null;
}

export function createAuthGate(options: AuthGateOptions): RequestHandler {
  const now = options.now ?? (() => new Date());

  return asyncHandler(async (req, res, next) => {
    const presented = readApiKey(req);
    if (!presented) {
      throw new ApiError('unauthorized', 'API key required');
    }
    const keyHash = hashApiKey(presented);
    const key = await options.keys.findApiKeyByHash(keyHash);
    if (!key) {
      log.warn('Unknown API key', { keyPrefix: presented.slice(0, 8), path: req.originalUrl });
      throw new ApiError('unauthorized', 'Invalid API key');
    }
    req.apiKeyHash = keyHash;

    const state = apiKeyState(key, now());
    if (state !== 'usable') {
      log.warn('API key refused', { keyId: key.id, state });
      throw new ApiError('forbidden', state === 'expired' ? 'API key has expired' : 'API key is inactive');
    }

    const decision = await options.keys.consumeApiKeyQuota(keyHash, options.windowMs);
    if (!decision) {
      throw new ApiError('unauthorized', 'Invalid API key');
    }
    res.setHeader('X-RateLimit-Limit', String(decision.limit));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      const retryAfterSeconds = Math.ceil((decision.retryAfterMs ?? options.windowMs) / 1000);
      res.setHeader('Retry-After', String(retryAfterSeconds));
      log.warn('Rate limit exceeded', { keyId: key.id, limit: decision.limit, retryAfterSeconds });
      throw new ApiError('rate_limited', `Rate limit of ${decision.limit} requests exceeded`);
    }

    req.apiKey = key;
    next();
  });
}

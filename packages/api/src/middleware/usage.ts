/**
 * Usage logger: one `usage_logs` row per request, written once the response
 * has been sent. Mount it before the auth gate so rejected requests are
 * recorded too.
 */
import type { Request, RequestHandler } from 'express';

import { createLogger, errorMessage } from '@rights-parser/shared';
import type { IUsageLogStore, NewUsageLog } from '@rights-parser/database';

const log = createLogger('usage');

function uploadedSize(req: Request): number | null {
  if (req.file) return req.file.size;
  const files = req.files;
  if (files && !Array.isArray(files)) {
    for (const list of Object.values(files)) {
      const first = list[0];
      if (first) return first.size;
    }
  }
  return null;
}

export function createUsageLogger(store: IUsageLogStore): RequestHandler {
  return (req, res, next) => {
    const t0 = Date.now();
    res.on('finish', () => {
      const entry: NewUsageLog = {
        jobId: req.jobId ?? null,
        apiKeyHash: req.apiKeyHash ?? null,
        endpoint: req.originalUrl.split('?')[0] ?? req.originalUrl,
        method: req.method,
        statusCode: res.statusCode,
        processingTimeMs: Date.now() - t0,
        fileSize: uploadedSize(req),
        ipAddress: req.ip ?? null,
        userAgent: req.get('user-agent') ?? null
      };
      store.appendUsageLog(entry).catch(err => {
        log.error('Failed to record usage', { endpoint: entry.endpoint, status: entry.statusCode, error: errorMessage(err) });
      });
    });
    next();
  };
}

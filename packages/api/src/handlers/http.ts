/**
 * HTTP plumbing shared by the route handlers: the error envelope, the async
 * handler wrapper and the snake_case job view.
 */
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';

import { createLogger, errorMessage } from '@rights-parser/shared';
import type { Job } from '@rights-parser/database';

const log = createLogger('http');

export type ErrorCode = 'unauthorized' | 'forbidden' | 'rate_limited' | 'bad_request' | 'not_found' | 'internal';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  unauthorized: 401,
  forbidden: 403,
  rate_limited: 429,
  bad_request: 400,
  not_found: 404,
  internal: 500
};

/**
 * Request rejected before or instead of any pipeline work.
 */
export class ApiError extends Error {
  code: ErrorCode;
  status: number;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }

  toJSON() {
    return { error_code: this.code, message: this.message } as const;
  }
}

export function errorBody(code: ErrorCode, message: string) {
  return { error_code: code, message };
}

export function isUuid(v: string): boolean {
  return /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(v);
}

/**
 * Express 4 does not await handlers; forward rejections to the error handler.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Final error handler. ApiErrors and upload limit errors keep their status;
 * anything else is logged and becomes a generic 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof ApiError) {
    res.status(err.status).json(err);
    return;
  }
  if (err instanceof multer.MulterError) {
    res.status(400).json(errorBody('bad_request', err.message));
    return;
  }
  log.error('Unhandled request error', {
    method: req.method,
    path: req.originalUrl,
    errorType: err instanceof Error ? err.name : typeof err,
    error: errorMessage(err)
  });
  res.status(500).json(errorBody('internal', 'Internal server error'));
}

/**
 * Public representation of a job. The encryption key is only shown for
 * completed jobs, alongside the CID it opens.
 */
export function jobView(job: Job) {
  return {
    job_id: job.id,
    file_name: job.fileName,
    file_size: job.fileSize,
    user_id: job.userId,
    status: job.status,
    ipfs_cid: job.ipfsCid,
    encryption_key: job.status === 'completed' ? job.encryptionKey : null,
    parsed_json: job.parsedJson,
    error_message: job.errorMessage,
    retry_count: job.retryCount,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString() ?? null,
    completed_at: job.completedAt?.toISOString() ?? null,
    processing_time_ms: job.processingTimeMs,
    model_used: job.modelUsed,
    webhook_url: job.webhookUrl,
    webhook_sent: job.webhookSent
  };
}

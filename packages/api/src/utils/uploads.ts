/**
 * Multipart upload handling. Files are buffered in memory by multer, size
 * capped, then written under the upload directory with a generated name.
 */
import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Request, RequestHandler } from 'express';
import multer from 'multer';

export const UPLOAD_FIELDS = ['pdf', 'file'] as const;

export function createUploadMiddleware(maxUploadBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 }
  });
  return upload.fields(UPLOAD_FIELDS.map(name => ({ name, maxCount: 1 })));
}

/** The uploaded document, from whichever accepted field carried it. */
export function pickUpload(req: Request): Express.Multer.File | null {
  const files = req.files;
  if (!files || Array.isArray(files)) return null;
  for (const field of UPLOAD_FIELDS) {
    const file = files[field]?.[0];
    if (file) return file;
  }
  return null;
}

export function safeFileName(name: string): string {
  const base = path.basename(name).replace(/[^A-Za-z0-9._-]+/g, '_');
  return base.length > 0 ? base.slice(-120) : 'document';
}

const EXTENSIONS = { pdf: '.pdf', text: '.txt' } as const;

/**
 * Write the upload to disk and return its path. The stored name always ends
 * in the extension of the detected format, which is how workers tell the
 * format again later.
 */
export async function storeUpload(
  uploadDir: string,
  file: Express.Multer.File,
  format: keyof typeof EXTENSIONS
): Promise<string> {
  await mkdir(uploadDir, { recursive: true });
  const name = safeFileName(file.originalname);
  const ext = EXTENSIONS[format];
  const stored = name.toLowerCase().endsWith(ext) ? name : `${name}${ext}`;
  const target = path.join(uploadDir, `${randomUUID()}-${stored}`);
  await writeFile(target, file.buffer);
  return target;
}

/**
 * Document → plain text conversion.
 *
 * PDFs go through pdf-parse; plain-text uploads are decoded as UTF-8. The
 * format is decided from the file's magic bytes first, then its MIME type and
 * extension.
 */
import { createRequire } from 'node:module';
import type pdf from 'pdf-parse';

import { errorMessage } from '@rights-parser/shared';

type PdfParseResult = Awaited<ReturnType<typeof pdf>>;

/** The part of pdf-parse's API the extractor uses. */
export type PdfParseFn = (data: Buffer) => Promise<Pick<PdfParseResult, 'text' | 'numpages'>>;

/**
 * The document cannot be turned into usable text. Not retryable: the same
 * bytes will fail the same way.
 */
export class TextExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TextExtractionError';
  }
}

export interface ExtractedText {
  text: string;
  pages: number;
  format: 'pdf' | 'text';
}

export interface TextExtractor {
  extract(input: { buffer: Buffer; fileName: string; mimeType?: string | null }): Promise<ExtractedText>;
}

const PDF_MAGIC = Buffer.from('%PDF-');

/** MIME type implied by a stored file's extension, if it has a known one. */
export function mimeTypeFromPath(filePath: string): string | null {
  const lower = filePath.toLowerCase();
  if (lower.endsWith('.pdf')) return 'application/pdf';
  if (lower.endsWith('.txt')) return 'text/plain';
  return null;
}

function loadPdfParse(): PdfParseFn {
  // The package entry point runs a self-test when it has no parent module, which
  // is always the case under ESM; the library file underneath does not.
  const require = createRequire(import.meta.url);
  const pdfParse: typeof pdf = require('pdf-parse/lib/pdf-parse.js');
  return pdfParse;
}

export function detectFormat(input: { buffer: Buffer; fileName: string; mimeType?: string | null }): 'pdf' | 'text' | null {
  if (input.buffer.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) return 'pdf';
  const mime = input.mimeType?.toLowerCase() ?? '';
  const name = input.fileName.toLowerCase();
  if (mime === 'application/pdf' || name.endsWith('.pdf')) return 'pdf';
  if (mime.startsWith('text/') || name.endsWith('.txt')) return 'text';
  return null;
}

/**
 * Collapse runs of spaces and blank lines left by PDF text layers.
 */
export function tidyText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\u00a0]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function createTextExtractor(deps: { pdfParse?: PdfParseFn } = {}): TextExtractor {
  let pdfParse = deps.pdfParse;

  return {
    async extract(input) {
      const format = detectFormat(input);
      if (format === 'text') {
        return { text: tidyText(input.buffer.toString('utf8')), pages: 1, format };
      }
      if (format !== 'pdf') {
        throw new TextExtractionError(`Unsupported document type for ${input.fileName}`);
      }

      pdfParse ??= loadPdfParse();
      let parsed: Pick<PdfParseResult, 'text' | 'numpages'>;
      try {
        parsed = await pdfParse(input.buffer);
      } catch (err) {
        throw new TextExtractionError(
          `Could not read PDF ${input.fileName}: ${errorMessage(err)}`
        );
      }
      return { text: tidyText(parsed.text), pages: parsed.numpages, format };
    }
  };
}

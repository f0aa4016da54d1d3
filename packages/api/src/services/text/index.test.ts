import { describe, expect, it, vi } from 'vitest';
import {
  TextExtractionError,
  createTextExtractor,
  detectFormat,
  mimeTypeFromPath,
  tidyText,
  type PdfParseFn
} from './index';

const PDF_BYTES = Buffer.from('%PDF-1.7\n%fake');

describe('detectFormat', () => {
  it('trusts magic bytes over the name', () => {
    expect(detectFormat({ buffer: PDF_BYTES, fileName: 'upload.bin' })).toBe('pdf');
  });

  it('falls back to MIME type and extension', () => {
    expect(detectFormat({ buffer: Buffer.from('hi'), fileName: 'x', mimeType: 'text/plain' })).toBe('text');
    expect(detectFormat({ buffer: Buffer.from('hi'), fileName: 'deal.TXT' })).toBe('text');
    expect(detectFormat({ buffer: Buffer.from('hi'), fileName: 'deal.docx' })).toBeNull();
  });
});

describe('tidyText', () => {
  it('collapses runs of spaces and blank lines', () => {
    expect(tidyText('  Line one \r\n\r\n\r\n\r\nLine\t\ttwo  ')).toBe('Line one\n\nLine two');
  });
});

describe('createTextExtractor', () => {
  it('decodes plain text uploads', async () => {
    const extractor = createTextExtractor({ pdfParse: vi.fn<PdfParseFn>() });
    await expect(extractor.extract({ buffer: Buffer.from('Hello   world'), fileName: 'a.txt' })).resolves.toEqual({
      text: 'Hello world',
      pages: 1,
      format: 'text'
    });
  });

  it('runs PDFs through the parser', async () => {
    const pdfParse = vi.fn<PdfParseFn>(async () => ({ text: 'Page  one\n\n\n\nPage two', numpages: 2 }));
    const result = await createTextExtractor({ pdfParse }).extract({ buffer: PDF_BYTES, fileName: 'a.pdf' });
    expect(result).toEqual({ text: 'Page one\n\nPage two', pages: 2, format: 'pdf' });
    expect(pdfParse).toHaveBeenCalledWith(PDF_BYTES);
  });

  it('reports unreadable and unsupported documents as TextExtractionError', async () => {
    const pdfParse = vi.fn<PdfParseFn>(async () => {
      throw new Error('bad xref');
    });
    const extractor = createTextExtractor({ pdfParse });

    await expect(extractor.extract({ buffer: PDF_BYTES, fileName: 'a.pdf' })).rejects.toThrowError(
      'Could not read PDF a.pdf: bad xref'
    );
    await expect(extractor.extract({ buffer: Buffer.from('PK'), fileName: 'a.docx' })).rejects.toBeInstanceOf(
      TextExtractionError
    );
  });
});

describe('mimeTypeFromPath', () => {
  it('maps stored extensions back to a MIME type', () => {
    expect(mimeTypeFromPath('/uploads/1f2e-agreement.PDF')).toBe('application/pdf');
    expect(mimeTypeFromPath('/uploads/1f2e-agreement.txt')).toBe('text/plain');
    expect(mimeTypeFromPath('/uploads/1f2e-agreement')).toBeNull();
  });
});

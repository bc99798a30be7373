import { describe, it, expect } from 'vitest';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { extractTextFromPdf } from '../../src/infrastructure/pdf-parser.js';

async function createPdf(pages: string[][]): Promise<string> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const lines of pages) {
    const page = doc.addPage([595, 842]);
    lines.forEach((line, i) => page.drawText(line, { x: 50, y: 780 - i * 20, size: 12, font }));
  }

  return Buffer.from(await doc.save()).toString('base64');
}

describe('extractTextFromPdf', () => {
  it('extracts text from a valid PDF', async () => {
    const base64 = await createPdf([['Invoice INV-1001', 'Total 119.00 EUR']]);
    const result = await extractTextFromPdf(base64, { filename: 'invoice.pdf' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toContain('Invoice INV-1001');
      expect(result.value).toContain('Total 119.00 EUR');
    }
  });

  it('reads every page', async () => {
    const base64 = await createPdf([['First page'], ['Second page']]);
    const result = await extractTextFromPdf(base64);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toContain('First page');
      expect(result.value).toContain('Second page');
    }
  });

  it('returns PDF_PARSE_FAILED for corrupt data', async () => {
    const corrupt = Buffer.from('not a pdf at all').toString('base64');
    const result = await extractTextFromPdf(corrupt);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_PARSE_FAILED');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('returns PDF_EMPTY for a PDF with no text', async () => {
    const base64 = await createPdf([[]]);
    const result = await extractTextFromPdf(base64);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({
        code: 'PDF_EMPTY',
        message: 'PDF contains no extractable text',
        retryable: false,
        details: undefined,
      });
    }
  });

  it('returns PDF_TOO_LARGE above the configured limit', async () => {
    const result = await extractTextFromPdf(Buffer.alloc(64).toString('base64'), { maxSizeBytes: 32 });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_TOO_LARGE');
      expect(result.error.message).toBe('PDF size 64 bytes exceeds 32 byte limit');
    }
  });

  it('applies the default 10MB limit', async () => {
    const large = Buffer.alloc(11 * 1024 * 1024, 0).toString('base64');
    const result = await extractTextFromPdf(large);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_TOO_LARGE');
      expect(result.error.retryable).toBe(false);
    }
  });
});

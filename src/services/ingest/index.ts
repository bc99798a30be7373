import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { Invoice, PdfDocumentInput } from '../../domain/types.js';
import { ok } from '../../domain/result.js';
import { logger } from '../../infrastructure/logger.js';
import { extractTextFromPdf } from '../../infrastructure/pdf-parser.js';
import { extractInvoiceData } from '../extraction/index.js';
import type { IngestFailure, IngestOptions, IngestResult } from './types.js';

export type { IngestFailure, IngestOptions, IngestResult } from './types.js';

export async function ingestInvoicePdf(
  document: PdfDocumentInput,
  options: IngestOptions = {},
): Promise<Result<Invoice, AppError>> {
  const { filename, pdfBase64 } = document;

  const parseResult = await extractTextFromPdf(pdfBase64, { filename, maxSizeBytes: options.maxSizeBytes });
  if (!parseResult.ok) return parseResult;

  const extractResult = await extractInvoiceData(parseResult.value, filename, options.batchId);
  if (!extractResult.ok) return extractResult;

  logger.info({ batchId: options.batchId, filename, step: 'ingest' }, 'Invoice PDF ingested');
  return ok(extractResult.value.invoice);
}

/** Documents are processed one at a time, in the order given. */
export async function ingestInvoicePdfs(
  documents: readonly PdfDocumentInput[],
  options: IngestOptions = {},
): Promise<Result<IngestResult, AppError>> {
  const invoices: Invoice[] = [];
  const failures: IngestFailure[] = [];

  for (const document of documents) {
    const result = await ingestInvoicePdf(document, options);
    if (result.ok) {
      invoices.push(result.value);
      continue;
    }

    if (!options.continueOnError) return result;

    logger.warn(
      { batchId: options.batchId, filename: document.filename, errorCode: result.error.code },
      'Skipping invoice PDF that could not be ingested',
    );
    failures.push({ filename: document.filename, error: result.error });
  }

  return ok({ invoices, failures });
}

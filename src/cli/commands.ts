import { randomUUID } from 'node:crypto';
import type { AppError } from '../domain/errors.js';
import { ok, type Result } from '../domain/result.js';
import type { Invoice, ValidationReport } from '../domain/types.js';
import { readJsonFile, readPdfDirectory, writeJsonFile } from '../infrastructure/files.js';
import { createBatchLogger } from '../infrastructure/logger.js';
import { ingestInvoicePdfs } from '../services/ingest/index.js';
import { validateInvoices } from '../services/validation/index.js';
import { formatSummary } from './summary.js';

export type Print = (line: string) => void;

export interface CommandContext {
  knownCurrencies: readonly string[];
  maxPdfSizeBytes?: number;
  print?: Print;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function printError(print: Print, error: AppError): number {
  print(`Error: ${error.message}${error.details ? ` (${error.details})` : ''}`);
  return EXIT_FAILURE;
}

async function extractDirectory(pdfDir: string, ctx: CommandContext, batchId: string): Promise<Result<Invoice[], AppError>> {
  const print = ctx.print ?? console.log;

  const docsResult = await readPdfDirectory(pdfDir);
  if (!docsResult.ok) return docsResult;

  const ingestResult = await ingestInvoicePdfs(docsResult.value, {
    batchId,
    maxSizeBytes: ctx.maxPdfSizeBytes,
    continueOnError: true,
  });
  if (!ingestResult.ok) return ingestResult;

  const { invoices, failures } = ingestResult.value;
  for (const invoice of invoices) print(`  extracted: ${invoice.source_file ?? '(unnamed)'}`);
  for (const failure of failures) print(`  failed:    ${failure.filename} - ${failure.error.message}`);

  return ok(invoices);
}

function validateAndSummarise(invoices: readonly unknown[], ctx: CommandContext, batchId: string, source: string): ValidationReport {
  const print = ctx.print ?? console.log;
  const report = validateInvoices(invoices, { knownCurrencies: ctx.knownCurrencies, batchId, source });
  for (const line of formatSummary(report)) print(line);
  return report;
}

export async function extractCommand(args: { pdfDir: string; output: string }, ctx: CommandContext): Promise<number> {
  const print = ctx.print ?? console.log;
  const batchId = randomUUID();
  createBatchLogger(batchId, 'cli:extract').info({ pdfDir: args.pdfDir }, 'Extract command started');

  print(`Extracting invoices from: ${args.pdfDir}`);
  const extractResult = await extractDirectory(args.pdfDir, ctx, batchId);
  if (!extractResult.ok) return printError(print, extractResult.error);

  const extracted = extractResult.value;

  if (extracted.length === 0) {
    print('No invoices extracted. Check that the directory contains readable PDF files.');
    return EXIT_FAILURE;
  }

  const written = await writeJsonFile(args.output, extracted);
  if (!written.ok) return printError(print, written.error);

  print(`Extracted ${extracted.length} invoice(s), saved to: ${args.output}`);
  return EXIT_OK;
}

export async function validateCommand(args: { input: string; report: string }, ctx: CommandContext): Promise<number> {
  const print = ctx.print ?? console.log;
  const batchId = randomUUID();

  print(`Validating invoices from: ${args.input}`);
  const input = await readJsonFile(args.input);
  if (!input.ok) return printError(print, input.error);

  if (!Array.isArray(input.value)) {
    print('Error: input file must contain a JSON array of invoices');
    return EXIT_FAILURE;
  }

  const report = validateAndSummarise(input.value, ctx, batchId, 'cli:validate');

  const written = await writeJsonFile(args.report, report);
  if (!written.ok) return printError(print, written.error);

  print('');
  print(`Full report saved to: ${args.report}`);
  return report.summary.invalid > 0 ? EXIT_FAILURE : EXIT_OK;
}

export function extractedPathFor(reportPath: string): string {
  return reportPath.endsWith('.json')
    ? `${reportPath.slice(0, -'.json'.length)}_extracted.json`
    : `${reportPath}_extracted.json`;
}

export async function fullRunCommand(
  args: { pdfDir: string; report: string; saveExtracted: boolean },
  ctx: CommandContext,
): Promise<number> {
  const print = ctx.print ?? console.log;
  const batchId = randomUUID();

  print('Step 1: extraction');
  const extractResult = await extractDirectory(args.pdfDir, ctx, batchId);
  if (!extractResult.ok) return printError(print, extractResult.error);

  const extracted = extractResult.value;

  if (extracted.length === 0) {
    print('No invoices extracted. Exiting.');
    return EXIT_FAILURE;
  }

  print('Step 2: validation');
  const report = validateAndSummarise(extracted, ctx, batchId, 'cli:full-run');

  const written = await writeJsonFile(args.report, report);
  if (!written.ok) return printError(print, written.error);
  print(`Report saved to: ${args.report}`);

  if (args.saveExtracted) {
    const extractedPath = extractedPathFor(args.report);
    const savedExtracted = await writeJsonFile(extractedPath, extracted);
    if (!savedExtracted.ok) return printError(print, savedExtracted.error);
    print(`Extracted data saved to: ${extractedPath}`);
  }

  return report.summary.invalid > 0 ? EXIT_FAILURE : EXIT_OK;
}

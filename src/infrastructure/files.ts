import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import type { PdfDocumentInput } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'files' });

function isMissing(cause: unknown): boolean {
  return typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT';
}

function readFailure(path: string, cause: unknown, what: string): AppError {
  const details = cause instanceof Error ? cause.message : String(cause);
  if (isMissing(cause)) {
    log.error({ errorCode: ErrorCode.FILE_NOT_FOUND, retryable: false, path }, `${what} not found`);
    return createAppError(ErrorCode.FILE_NOT_FOUND, `${what} not found: ${path}`, false, details);
  }
  log.error({ errorCode: ErrorCode.FILE_READ_ERROR, retryable: false, path, details }, `Failed to read ${what.toLowerCase()}`);
  return createAppError(ErrorCode.FILE_READ_ERROR, `Failed to read ${what.toLowerCase()}: ${path}`, false, details);
}

/** Every `*.pdf` directly inside `dir`, sorted by file name, as base64 documents. */
export async function readPdfDirectory(dir: string): Promise<Result<PdfDocumentInput[], AppError>> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (cause) {
    return err(readFailure(dir, cause, 'Directory'));
  }

  const pdfNames = names.filter((name) => name.toLowerCase().endsWith('.pdf')).sort();
  const documents: PdfDocumentInput[] = [];

  for (const name of pdfNames) {
    const path = join(dir, name);
    try {
      const data = await readFile(path);
      documents.push({ filename: basename(path), pdfBase64: data.toString('base64') });
    } catch (cause) {
      return err(readFailure(path, cause, 'PDF file'));
    }
  }

  log.debug({ dir, count: documents.length }, 'PDF directory read');
  return ok(documents);
}

export async function readJsonFile(path: string): Promise<Result<unknown, AppError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (cause) {
    return err(readFailure(path, cause, 'Input file'));
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ errorCode: ErrorCode.INPUT_INVALID_JSON, retryable: false, path, details }, 'Input file is not valid JSON');
    return err(createAppError(ErrorCode.INPUT_INVALID_JSON, `Invalid JSON in input file: ${path}`, false, details));
  }
}

export async function writeJsonFile(path: string, data: unknown): Promise<Result<string, AppError>> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ errorCode: ErrorCode.FILE_WRITE_ERROR, retryable: true, path, details }, 'Failed to write JSON file');
    return err(createAppError(ErrorCode.FILE_WRITE_ERROR, `Failed to write file: ${path}`, true, details));
  }

  log.debug({ path }, 'JSON file written');
  return ok(path);
}

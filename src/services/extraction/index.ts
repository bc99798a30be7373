import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { invoiceRecordSchema, describeIssues } from '../../domain/schemas.js';
import { logger } from '../../infrastructure/logger.js';
import { getLlm } from '../../infrastructure/llm/index.js';
import type { LLMProvider, LLMResponse } from '../../infrastructure/llm/types.js';
import { normalizeExtractedInvoice } from './normalize.js';
import { EXTRACTION_SYSTEM_PROMPT } from './prompt.js';
import type { ExtractionResult } from './types.js';

export type { ExtractionResult } from './types.js';
export { normalizeExtractedInvoice, normalizeAmount, normalizeDate } from './normalize.js';

const log = logger.child({ module: 'extraction' });

export async function extractInvoiceData(
  pdfText: string,
  sourceFile?: string,
  batchId?: string,
): Promise<Result<ExtractionResult, AppError>> {
  const ctx = { batchId, sourceFile, step: 'extracting' };

  log.info(ctx, 'Starting invoice extraction');

  const llmResult = await callLlm(getLlm(), pdfText, ctx);
  if (!llmResult.ok) return llmResult;

  const { response, parsed } = llmResult.value;

  const record = invoiceRecordSchema.safeParse({
    ...normalizeExtractedInvoice(parsed),
    source_file: sourceFile ?? null,
  });
  if (!record.success) {
    const details = describeIssues(record.error);
    log.error({ ...ctx, errorCode: ErrorCode.EXTRACTION_INVALID_RECORD, retryable: false, details }, 'Extracted data is not an invoice record');
    return err(
      createAppError(ErrorCode.EXTRACTION_INVALID_RECORD, 'Extracted data does not match the invoice record shape', false, details),
    );
  }

  log.info(
    { ...ctx, model: response.model, latencyMs: response.latencyMs, lineItems: record.data.line_items.length },
    'Extraction completed',
  );

  return ok({
    invoice: record.data,
    rawResponse: response.content,
    model: response.model,
    latencyMs: response.latencyMs,
  });
}

async function callLlm(
  llm: LLMProvider,
  pdfText: string,
  ctx: Record<string, unknown>,
): Promise<Result<{ response: LLMResponse; parsed: Record<string, unknown> }, AppError>> {
  const chatResult = await llm.chat(EXTRACTION_SYSTEM_PROMPT, pdfText, { responseFormat: 'json' });
  if (!chatResult.ok) return chatResult;

  const parsed = tryParseJson(chatResult.value.content);
  if (parsed) {
    return ok({ response: chatResult.value, parsed });
  }

  log.warn({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'LLM returned malformed JSON, retrying once');

  const retryResult = await llm.chat(EXTRACTION_SYSTEM_PROMPT, pdfText, { responseFormat: 'json' });
  if (!retryResult.ok) return retryResult;

  const retryParsed = tryParseJson(retryResult.value.content);
  if (retryParsed) {
    return ok({ response: retryResult.value, parsed: retryParsed });
  }

  log.error({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'LLM returned malformed JSON on both attempts');
  return err(
    createAppError(
      ErrorCode.LLM_MALFORMED_RESPONSE,
      'LLM returned invalid JSON on both attempts',
      false,
      retryResult.value.content,
    ),
  );
}

function tryParseJson(content: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

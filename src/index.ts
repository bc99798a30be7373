export type {
  Amount,
  Invoice,
  LineItem,
  RuleCategory,
  Severity,
  Violation,
  ValidationResult,
  ValidationSummary,
  ValidationReport,
  PdfDocumentInput,
} from './domain/types.js';
export { DEFAULT_KNOWN_CURRENCIES, RULE_CATEGORIES } from './domain/types.js';
export { invoiceRecordSchema, lineItemSchema } from './domain/schemas.js';
export type { AppError } from './domain/errors.js';
export { ErrorCode } from './domain/errors.js';
export type { Result } from './domain/result.js';

export {
  validateInvoices,
  runEngine,
  buildReport,
  topErrors,
  createRuleRegistry,
  groupRulesByCategory,
  defineRule,
  duplicateInvoiceDetector,
  UNPARSEABLE_RECORD,
} from './services/validation/index.js';
export type { Rule, BatchRule, EngineOptions, ValidateOptions } from './services/validation/index.js';

export { ingestInvoicePdf, ingestInvoicePdfs } from './services/ingest/index.js';
export { extractInvoiceData, normalizeExtractedInvoice } from './services/extraction/index.js';
export { createApp } from './api/app.js';

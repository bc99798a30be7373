import { randomUUID } from 'node:crypto';
import type { ValidationReport } from '../../domain/types.js';
import { createBatchLogger } from '../../infrastructure/logger.js';
import { runEngine } from './engine.js';
import { buildReport } from './report.js';
import type { EngineOptions } from './types.js';

export type { Rule, BatchRule, EngineOptions, EngineRun, RuleEvaluator, Flag } from './types.js';
export { defineRule } from './types.js';
export { createRuleRegistry, defaultBatchRules, groupRulesByCategory } from './registry.js';
export { duplicateInvoiceDetector } from './duplicate-detector.js';
export { runEngine, UNPARSEABLE_RECORD } from './engine.js';
export { buildReport, topErrors } from './report.js';

export interface ValidateOptions extends EngineOptions {
  batchId?: string;
  source?: string;
}

/** Runs the engine over a batch of raw records and shapes the result into a report. */
export function validateInvoices(batch: readonly unknown[], options: ValidateOptions = {}): ValidationReport {
  const { batchId = randomUUID(), source, ...engineOptions } = options;
  const log = createBatchLogger(batchId, source).child({ module: 'validation' });

  log.info({ total: batch.length }, 'Starting validation');

  const report = buildReport(runEngine(batch, engineOptions));

  for (const result of report.results) {
    if (!result.is_valid) {
      log.debug(
        { invoiceRef: result.invoice_ref, ruleIds: result.violations.map((v) => v.rule_id) },
        'Invoice failed validation',
      );
    }
  }

  const { total, valid, invalid } = report.summary;
  log.info({ total, valid, invalid }, 'Validation completed');

  return report;
}

import { invoiceRecordSchema, describeIssues } from '../../domain/schemas.js';
import type { Invoice, ValidationResult, Violation } from '../../domain/types.js';
import { createRuleRegistry, defaultBatchRules } from './registry.js';
import type { EngineOptions, EngineRun } from './types.js';
import { isBlank } from './values.js';

export const UNPARSEABLE_RECORD = 'unparseable_record';

interface ParsedEntry {
  invoice: Invoice | null;
  violations: Violation[];
}

function parseEntry(raw: unknown): ParsedEntry {
  const parsed = invoiceRecordSchema.safeParse(raw);
  if (parsed.success) {
    return { invoice: Object.freeze(parsed.data), violations: [] };
  }

  return {
    invoice: null,
    violations: [
      {
        rule_id: UNPARSEABLE_RECORD,
        category: 'format',
        field: null,
        message: `record is not a valid invoice: ${describeIssues(parsed.error)}`,
        severity: 'error',
      },
    ],
  };
}

function invoiceRef(invoice: Invoice | null, index: number): string {
  if (invoice !== null && invoice.invoice_number !== null && !isBlank(invoice.invoice_number)) {
    return invoice.invoice_number.trim();
  }
  return String(index);
}

/**
 * Validates a batch. Pure and synchronous: per-invoice rules run in registry
 * order, then the batch rules run once over the whole batch and their
 * violations are appended per index. A throwing rule aborts the whole run.
 */
export function runEngine(batch: readonly unknown[], options: EngineOptions = {}): EngineRun {
  const rules = options.rules ?? createRuleRegistry({ knownCurrencies: options.knownCurrencies });
  const batchRules = options.batchRules ?? defaultBatchRules;

  const entries = batch.map(parseEntry);

  for (const entry of entries) {
    if (entry.invoice === null) continue;
    for (const rule of rules) {
      entry.violations.push(...rule.evaluate(entry.invoice));
    }
  }

  const invoices = entries.map((entry) => entry.invoice);
  for (const batchRule of batchRules) {
    for (const [index, violations] of batchRule.evaluate(invoices)) {
      entries[index]?.violations.push(...violations);
    }
  }

  const errorFrequency = new Map<string, number>();
  const results = entries.map((entry, index): ValidationResult => {
    for (const ruleId of new Set(entry.violations.map((v) => v.rule_id))) {
      errorFrequency.set(ruleId, (errorFrequency.get(ruleId) ?? 0) + 1);
    }

    return {
      invoice_ref: invoiceRef(entry.invoice, index),
      ...(entry.invoice !== null && entry.invoice.source_file !== null && { source_file: entry.invoice.source_file }),
      is_valid: !entry.violations.some((v) => v.severity === 'error'),
      violations: entry.violations,
    };
  });

  return { results, errorFrequency };
}

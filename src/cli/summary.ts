import type { ValidationReport } from '../domain/types.js';
import { topErrors } from '../services/validation/index.js';

const RULE = '='.repeat(50);

/** Human-readable summary lines for a report: totals, top rules, then each invalid invoice. */
export function formatSummary(report: ValidationReport, topLimit = 10): string[] {
  const { total, valid, invalid } = report.summary;
  const lines = [
    '',
    RULE,
    'VALIDATION SUMMARY',
    RULE,
    `Total invoices:   ${total}`,
    `Valid:            ${valid}`,
    `Invalid:          ${invalid}`,
  ];

  const top = topErrors(report, topLimit);
  if (top.length > 0) {
    lines.push('', 'Error breakdown:');
    for (const [ruleId, count] of top) {
      lines.push(`  - ${ruleId}: ${count}`);
    }
  }

  const failed = report.results.filter((r) => !r.is_valid);
  if (failed.length > 0) {
    lines.push('', 'Invalid invoices:');
    for (const result of failed) {
      lines.push('', `  Invoice: ${result.invoice_ref}`);
      if (result.source_file !== undefined) lines.push(`  Source:  ${result.source_file}`);
      lines.push('  Errors:');
      for (const v of result.violations) {
        lines.push(`    - [${v.rule_id}] ${v.message}`);
      }
    }
  }

  return lines;
}

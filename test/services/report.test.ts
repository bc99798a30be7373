import { describe, it, expect } from 'vitest';
import { buildReport, topErrors } from '../../src/services/validation/report.js';
import type { ValidationResult } from '../../src/domain/types.js';

const valid: ValidationResult = { invoice_ref: 'A', is_valid: true, violations: [] };
const invalid: ValidationResult = {
  invoice_ref: 'B',
  is_valid: false,
  violations: [
    { rule_id: 'due_date_logical', category: 'business', field: 'due_date', message: 'x', severity: 'error' },
  ],
};

describe('buildReport', () => {
  it('totals valid and invalid results', () => {
    const report = buildReport({ results: [valid, invalid, valid], errorFrequency: new Map([['due_date_logical', 1]]) });

    expect(report.summary).toEqual({ total: 3, valid: 2, invalid: 1, error_frequency: { due_date_logical: 1 } });
    expect(report.results).toEqual([valid, invalid, valid]);
  });

  it('orders error_frequency by count, then by rule id', () => {
    const report = buildReport({
      results: [],
      errorFrequency: new Map([
        ['totals_not_zero', 2],
        ['currency_required', 2],
        ['amounts_numeric', 5],
      ]),
    });

    expect(Object.entries(report.summary.error_frequency)).toEqual([
      ['amounts_numeric', 5],
      ['currency_required', 2],
      ['totals_not_zero', 2],
    ]);
  });
});

describe('topErrors', () => {
  it('returns at most the requested number of entries', () => {
    const report = buildReport({
      results: [],
      errorFrequency: new Map([
        ['b', 1],
        ['a', 3],
        ['c', 2],
      ]),
    });

    expect(topErrors(report, 2)).toEqual([
      ['a', 3],
      ['c', 2],
    ]);
    expect(topErrors(report)).toHaveLength(3);
  });
});

import { describe, it, expect } from 'vitest';
import {
  invoiceNumberRequired,
  invoiceDateRequired,
  partiesRequired,
  currencyRequired,
} from '../../src/services/validation/rules/completeness.js';
import {
  dateFormatValid,
  createCurrencyInKnownSetRule,
  amountsNumeric,
  amountsNonNegative,
} from '../../src/services/validation/rules/format.js';
import { lineItemsSumMatch, taxCalculationValid, dueDateLogical } from '../../src/services/validation/rules/business.js';
import { totalsNotZero } from '../../src/services/validation/rules/anomaly.js';
import { DEFAULT_KNOWN_CURRENCIES } from '../../src/domain/types.js';
import { invoice, lineItem } from '../fixtures/invoices.js';

describe('completeness rules', () => {
  it('flags a null invoice_number', () => {
    expect(invoiceNumberRequired.evaluate(invoice({ invoice_number: null }))).toEqual([
      {
        rule_id: 'invoice_number_required',
        category: 'completeness',
        field: 'invoice_number',
        message: 'invoice_number is missing or empty',
        severity: 'error',
      },
    ]);
  });

  it('treats whitespace-only and absent values as empty', () => {
    expect(invoiceNumberRequired.evaluate(invoice({ invoice_number: '   ' }))).toHaveLength(1);
    expect(invoiceDateRequired.evaluate(invoice({ invoice_date: undefined }))).toHaveLength(1);
    expect(invoiceDateRequired.evaluate(invoice({ invoice_date: '' }))[0]?.field).toBe('invoice_date');
  });

  it('reports one violation per missing party, buyer first', () => {
    const violations = partiesRequired.evaluate(invoice({ buyer_name: null, seller_name: '' }));

    expect(violations.map((v) => [v.field, v.message])).toEqual([
      ['buyer_name', 'buyer_name is missing or empty'],
      ['seller_name', 'seller_name is missing or empty'],
    ]);
  });

  it('passes when both parties are present', () => {
    expect(partiesRequired.evaluate(invoice())).toEqual([]);
  });

  it('flags a missing currency', () => {
    expect(currencyRequired.evaluate(invoice({ currency: null }))[0]?.rule_id).toBe('currency_required');
    expect(currencyRequired.evaluate(invoice())).toEqual([]);
  });
});

describe('date_format_valid', () => {
  it('accepts real calendar dates, including leap days', () => {
    expect(dateFormatValid.evaluate(invoice({ invoice_date: '2024-02-29', due_date: '2024-03-01' }))).toEqual([]);
  });

  it.each([
    ['2024-02-30'],
    ['2023-02-29'],
    ['2024-13-01'],
    ['2024-00-10'],
    ['2024/01/01'],
    ['22.05.2024'],
    ['2024-1-1'],
  ])('rejects %s', (value) => {
    const violations = dateFormatValid.evaluate(invoice({ due_date: value }));
    expect(violations).toEqual([
      {
        rule_id: 'date_format_valid',
        category: 'format',
        field: 'due_date',
        message: `due_date has invalid format: ${value}`,
        severity: 'error',
      },
    ]);
  });

  it('checks each date field independently and skips null ones', () => {
    const violations = dateFormatValid.evaluate(
      invoice({ invoice_date: 'yesterday', due_date: null, delivery_date: 'sofort' }),
    );
    expect(violations.map((v) => v.field)).toEqual(['invoice_date', 'delivery_date']);
  });

  it('leaves a blank invoice_date to invoice_date_required', () => {
    expect(dateFormatValid.evaluate(invoice({ invoice_date: '  ' }))).toEqual([]);
  });

  it('reports blank due and delivery dates', () => {
    const violations = dateFormatValid.evaluate(invoice({ due_date: '   ', delivery_date: '' }));

    expect(violations.map((v) => [v.field, v.message])).toEqual([
      ['due_date', 'due_date has invalid format:    '],
      ['delivery_date', 'delivery_date has invalid format: '],
    ]);
  });
});

describe('currency_in_known_set', () => {
  const defaultRule = createCurrencyInKnownSetRule(DEFAULT_KNOWN_CURRENCIES);

  it('accepts each default currency', () => {
    for (const code of DEFAULT_KNOWN_CURRENCIES) {
      expect(defaultRule.evaluate(invoice({ currency: code }))).toEqual([]);
    }
  });

  it('is case-sensitive', () => {
    expect(defaultRule.evaluate(invoice({ currency: 'eur' }))).toEqual([
      {
        rule_id: 'currency_in_known_set',
        category: 'format',
        field: 'currency',
        message: "currency 'eur' is not in known set [EUR, USD, GBP, INR, JPY, CHF]",
        severity: 'error',
      },
    ]);
  });

  it('uses the configured set instead of the default', () => {
    const rule = createCurrencyInKnownSetRule(['SEK', 'NOK']);
    expect(rule.evaluate(invoice({ currency: 'SEK' }))).toEqual([]);
    expect(rule.evaluate(invoice({ currency: 'EUR' }))[0]?.message).toBe("currency 'EUR' is not in known set [SEK, NOK]");
  });

  it('ignores a missing currency', () => {
    expect(defaultRule.evaluate(invoice({ currency: null }))).toEqual([]);
  });
});

describe('amounts_numeric', () => {
  it('flags totals and line fields that are present but not numbers', () => {
    const violations = amountsNumeric.evaluate(
      invoice({
        net_total: 'abc',
        line_items: [lineItem(10), lineItem(5, { quantity: 'four' })],
      }),
    );

    expect(violations.map((v) => [v.field, v.message])).toEqual([
      ['net_total', 'net_total is not a number: abc'],
      ['line_items[1].quantity', 'line_items[1].quantity is not a number: four'],
    ]);
  });

  it('accepts numeric strings', () => {
    expect(amountsNumeric.evaluate(invoice({ net_total: '100.00', gross_total: '119' }))).toEqual([]);
  });
});

describe('amounts_non_negative', () => {
  it('flags negative totals and line prices in field order', () => {
    const violations = amountsNonNegative.evaluate(
      invoice({
        net_total: -5,
        tax_rate: -1,
        line_items: [lineItem(10, { unit_price: -1 }), lineItem(-2)],
      }),
    );

    expect(violations.map((v) => [v.field, v.message])).toEqual([
      ['net_total', 'net_total is negative: -5'],
      ['line_items[0].unit_price', 'line_items[0].unit_price is negative: -1'],
      ['line_items[1].unit_price', 'line_items[1].unit_price is negative: -2'],
      ['line_items[1].line_total', 'line_items[1].line_total is negative: -2'],
    ]);
    expect(violations.every((v) => v.category === 'format' && v.severity === 'error')).toBe(true);
  });

  it('accepts zero and null amounts', () => {
    expect(amountsNonNegative.evaluate(invoice({ tax_amount: 0, gross_total: null }))).toEqual([]);
  });
});

describe('line_items_sum_match', () => {
  it('accepts a 0.99% difference', () => {
    const inv = invoice({ net_total: 100, line_items: [lineItem(50), lineItem(50.99)] });
    expect(lineItemsSumMatch.evaluate(inv)).toEqual([]);
  });

  it('rejects a 1.01% difference', () => {
    const inv = invoice({ net_total: 100, line_items: [lineItem(50), lineItem(51.01)] });
    expect(lineItemsSumMatch.evaluate(inv)).toEqual([
      {
        rule_id: 'line_items_sum_match',
        category: 'business',
        field: 'net_total',
        message: 'line_items sum (101.01) does not match net_total (100.00)',
        severity: 'error',
      },
    ]);
  });

  it('floors the tolerance at 1% of 1.00 near zero', () => {
    expect(lineItemsSumMatch.evaluate(invoice({ net_total: 0, line_items: [lineItem(0.01)] }))).toEqual([]);
    expect(lineItemsSumMatch.evaluate(invoice({ net_total: 0, line_items: [lineItem(0.02)] }))).toHaveLength(1);
  });

  it('sums only non-null line totals', () => {
    const inv = invoice({ net_total: 100, line_items: [lineItem(100), lineItem(null)] });
    expect(lineItemsSumMatch.evaluate(inv)).toEqual([]);
  });

  it('is skipped without line items or net_total', () => {
    expect(lineItemsSumMatch.evaluate(invoice({ line_items: [] }))).toEqual([]);
    expect(lineItemsSumMatch.evaluate(invoice({ net_total: null, line_items: [lineItem(5)] }))).toEqual([]);
  });

  it('is skipped when an input is unreadable', () => {
    expect(lineItemsSumMatch.evaluate(invoice({ net_total: 'n/a', line_items: [lineItem(5)] }))).toEqual([]);
    expect(lineItemsSumMatch.evaluate(invoice({ net_total: 100, line_items: [lineItem('ten')] }))).toEqual([]);
  });
});

describe('tax_calculation_valid', () => {
  it('accepts a 0.02 difference (inclusive boundary)', () => {
    expect(taxCalculationValid.evaluate(invoice({ net_total: 100, tax_amount: 19, gross_total: 119.02 }))).toEqual([]);
    expect(taxCalculationValid.evaluate(invoice({ net_total: 100, tax_amount: 19, gross_total: 118.98 }))).toEqual([]);
  });

  it('rejects a 0.03 difference', () => {
    expect(taxCalculationValid.evaluate(invoice({ net_total: 100, tax_amount: 19, gross_total: 119.03 }))).toEqual([
      {
        rule_id: 'tax_calculation_valid',
        category: 'business',
        field: 'gross_total',
        message: 'tax calculation mismatch: net (100.00) + tax (19.00) != gross (119.03)',
        severity: 'error',
      },
    ]);
  });

  it('is skipped unless all three amounts are numbers', () => {
    expect(taxCalculationValid.evaluate(invoice({ tax_amount: null, gross_total: 500 }))).toEqual([]);
    expect(taxCalculationValid.evaluate(invoice({ tax_amount: 'x', gross_total: 500 }))).toEqual([]);
  });
});

describe('due_date_logical', () => {
  it('flags a due date before the invoice date', () => {
    expect(dueDateLogical.evaluate(invoice({ invoice_date: '2024-03-10', due_date: '2024-03-09' }))).toEqual([
      {
        rule_id: 'due_date_logical',
        category: 'business',
        field: 'due_date',
        message: 'due_date (2024-03-09) is before invoice_date (2024-03-10)',
        severity: 'error',
      },
    ]);
  });

  it('accepts equal dates', () => {
    expect(dueDateLogical.evaluate(invoice({ invoice_date: '2024-03-10', due_date: '2024-03-10' }))).toEqual([]);
  });

  it('compares across year boundaries', () => {
    expect(dueDateLogical.evaluate(invoice({ invoice_date: '2024-12-31', due_date: '2025-01-01' }))).toEqual([]);
    expect(dueDateLogical.evaluate(invoice({ invoice_date: '2025-01-01', due_date: '2024-12-31' }))).toHaveLength(1);
  });

  it('is skipped when either date does not parse', () => {
    expect(dueDateLogical.evaluate(invoice({ invoice_date: '2024-03-10', due_date: '2024-02-31' }))).toEqual([]);
    expect(dueDateLogical.evaluate(invoice({ invoice_date: null, due_date: '2000-01-01' }))).toEqual([]);
  });
});

describe('totals_not_zero', () => {
  it('flags a gross_total of exactly zero', () => {
    expect(totalsNotZero.evaluate(invoice({ gross_total: 0 }))).toEqual([
      {
        rule_id: 'totals_not_zero',
        category: 'anomaly',
        field: 'gross_total',
        message: 'gross_total is zero, likely an extraction error',
        severity: 'error',
      },
    ]);
    expect(totalsNotZero.evaluate(invoice({ gross_total: '0.00' }))).toHaveLength(1);
  });

  it('ignores small non-zero and missing totals', () => {
    expect(totalsNotZero.evaluate(invoice({ gross_total: 0.01 }))).toEqual([]);
    expect(totalsNotZero.evaluate(invoice({ gross_total: null }))).toEqual([]);
  });
});

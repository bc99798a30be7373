import type { Amount, Invoice, LineItem, Violation } from '../../../domain/types.js';
import { defineRule, type Flag, type Rule } from '../types.js';
import { isBlank, parseIsoDate, readAmount } from '../values.js';

const DATE_FIELDS = ['invoice_date', 'due_date', 'delivery_date'] as const;

const TOTAL_AMOUNT_FIELDS = ['net_total', 'tax_rate', 'tax_amount', 'gross_total'] as const;
const LINE_AMOUNT_FIELDS = ['quantity', 'unit_price', 'line_total'] as const;

const SIGNED_TOTAL_FIELDS = ['net_total', 'tax_amount', 'gross_total'] as const;
const SIGNED_LINE_FIELDS = ['unit_price', 'line_total'] as const;

type TotalField = (typeof TOTAL_AMOUNT_FIELDS)[number];
type LineField = (typeof LINE_AMOUNT_FIELDS)[number];

/** `[fieldPath, amount]` pairs for the named totals, then for each line item's named fields. */
function amountEntries(
  invoice: Readonly<Invoice>,
  totalFields: readonly TotalField[],
  lineFields: readonly LineField[],
): Array<[string, Amount]> {
  const entries: Array<[string, Amount]> = totalFields.map((field): [string, Amount] => [field, invoice[field]]);

  invoice.line_items.forEach((item: LineItem, index) => {
    for (const field of lineFields) {
      entries.push([`line_items[${index}].${field}`, item[field]]);
    }
  });

  return entries;
}

export const dateFormatValid = defineRule('date_format_valid', 'format', (invoice, flag) => {
  const violations: Violation[] = [];

  for (const field of DATE_FIELDS) {
    const value = invoice[field];
    if (value === null) continue;
    // A blank invoice_date is reported by invoice_date_required.
    if (field === 'invoice_date' && isBlank(value)) continue;
    if (parseIsoDate(value) === null) {
      violations.push(flag(field, `${field} has invalid format: ${value}`));
    }
  }

  return violations;
});

export function createCurrencyInKnownSetRule(knownCurrencies: readonly string[]): Rule {
  const known = new Set(knownCurrencies);
  const listed = [...known].join(', ');

  return defineRule('currency_in_known_set', 'format', (invoice, flag) => {
    const { currency } = invoice;
    if (currency === null || isBlank(currency) || known.has(currency)) return [];
    return [flag('currency', `currency '${currency}' is not in known set [${listed}]`)];
  });
}

function checkAmounts(
  entries: Array<[string, Amount]>,
  flag: Flag,
  describe: (field: string, amount: Amount) => string | null,
): Violation[] {
  const violations: Violation[] = [];
  for (const [field, amount] of entries) {
    const problem = describe(field, amount);
    if (problem !== null) violations.push(flag(field, problem));
  }
  return violations;
}

export const amountsNumeric = defineRule('amounts_numeric', 'format', (invoice, flag) =>
  checkAmounts(amountEntries(invoice, TOTAL_AMOUNT_FIELDS, LINE_AMOUNT_FIELDS), flag, (field, amount) => {
    const reading = readAmount(amount);
    return reading.kind === 'invalid' ? `${field} is not a number: ${reading.raw}` : null;
  }),
);

export const amountsNonNegative = defineRule('amounts_non_negative', 'format', (invoice, flag) =>
  checkAmounts(amountEntries(invoice, SIGNED_TOTAL_FIELDS, SIGNED_LINE_FIELDS), flag, (field, amount) => {
    const reading = readAmount(amount);
    return reading.kind === 'value' && reading.value < 0 ? `${field} is negative: ${reading.value}` : null;
  }),
);

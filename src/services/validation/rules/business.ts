import { defineRule } from '../types.js';
import { abs, formatUnits, parseIsoDate, readAmount } from '../values.js';

/** 1% of |net_total|, floored at 1.00: compared as `diff * 100 > max(|net|, 1.00)`. */
const SUM_TOLERANCE_PERCENT = 100n;
const SUM_TOLERANCE_FLOOR_UNITS = 10_000n;

/** 0.02 in fixed-point units; the boundary itself is accepted. */
const TAX_TOLERANCE_UNITS = 200n;

export const lineItemsSumMatch = defineRule('line_items_sum_match', 'business', (invoice, flag) => {
  const net = readAmount(invoice.net_total);
  if (net.kind !== 'value' || invoice.line_items.length === 0) return [];

  let sum = 0n;
  for (const item of invoice.line_items) {
    const total = readAmount(item.line_total);
    // An unreadable line total is already reported by amounts_numeric.
    if (total.kind === 'invalid') return [];
    if (total.kind === 'value') sum += total.units;
  }

  const diff = abs(sum - net.units);
  const base = abs(net.units) > SUM_TOLERANCE_FLOOR_UNITS ? abs(net.units) : SUM_TOLERANCE_FLOOR_UNITS;
  if (diff * SUM_TOLERANCE_PERCENT <= base) return [];

  return [
    flag(
      'net_total',
      `line_items sum (${formatUnits(sum)}) does not match net_total (${formatUnits(net.units)})`,
    ),
  ];
});

export const taxCalculationValid = defineRule('tax_calculation_valid', 'business', (invoice, flag) => {
  const net = readAmount(invoice.net_total);
  const tax = readAmount(invoice.tax_amount);
  const gross = readAmount(invoice.gross_total);
  if (net.kind !== 'value' || tax.kind !== 'value' || gross.kind !== 'value') return [];

  if (abs(net.units + tax.units - gross.units) <= TAX_TOLERANCE_UNITS) return [];

  return [
    flag(
      'gross_total',
      `tax calculation mismatch: net (${formatUnits(net.units)}) + tax (${formatUnits(tax.units)}) != gross (${formatUnits(gross.units)})`,
    ),
  ];
});

export const dueDateLogical = defineRule('due_date_logical', 'business', (invoice, flag) => {
  if (invoice.invoice_date === null || invoice.due_date === null) return [];

  const issued = parseIsoDate(invoice.invoice_date);
  const due = parseIsoDate(invoice.due_date);
  if (issued === null || due === null || due >= issued) return [];

  return [flag('due_date', `due_date (${invoice.due_date}) is before invoice_date (${invoice.invoice_date})`)];
});

export const businessRules = [lineItemsSumMatch, taxCalculationValid, dueDateLogical];

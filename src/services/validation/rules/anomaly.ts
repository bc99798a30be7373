import { defineRule } from '../types.js';
import { readAmount } from '../values.js';

export const totalsNotZero = defineRule('totals_not_zero', 'anomaly', (invoice, flag) => {
  const gross = readAmount(invoice.gross_total);
  if (gross.kind !== 'value' || gross.value !== 0) return [];
  return [flag('gross_total', 'gross_total is zero, likely an extraction error')];
});

export const anomalyRules = [totalsNotZero];

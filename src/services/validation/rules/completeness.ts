import { defineRule } from '../types.js';
import { isBlank } from '../values.js';

export const invoiceNumberRequired = defineRule('invoice_number_required', 'completeness', (invoice, flag) =>
  isBlank(invoice.invoice_number) ? [flag('invoice_number', 'invoice_number is missing or empty')] : [],
);

export const invoiceDateRequired = defineRule('invoice_date_required', 'completeness', (invoice, flag) =>
  isBlank(invoice.invoice_date) ? [flag('invoice_date', 'invoice_date is missing or empty')] : [],
);

export const partiesRequired = defineRule('parties_required', 'completeness', (invoice, flag) => {
  const parties = [
    ['buyer_name', invoice.buyer_name],
    ['seller_name', invoice.seller_name],
  ] as const;

  return parties
    .filter(([, name]) => isBlank(name))
    .map(([field]) => flag(field, `${field} is missing or empty`));
});

export const currencyRequired = defineRule('currency_required', 'completeness', (invoice, flag) =>
  isBlank(invoice.currency) ? [flag('currency', 'currency is missing or empty')] : [],
);

export const completenessRules = [invoiceNumberRequired, invoiceDateRequired, partiesRequired, currencyRequired];

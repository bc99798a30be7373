import type { Invoice, Violation } from '../../domain/types.js';
import type { BatchRule } from './types.js';
import { isBlank } from './values.js';

const RULE_ID = 'no_duplicate_invoices';

function duplicateKey(invoice: Readonly<Invoice>): string | null {
  const { invoice_number: number, seller_name: seller, invoice_date: date } = invoice;
  if (number === null || seller === null || date === null) return null;
  if (isBlank(number) || isBlank(seller) || isBlank(date)) return null;

  return JSON.stringify([number.trim().toLowerCase(), seller.trim().toLowerCase(), date]);
}

/**
 * Flags every invoice whose (invoice_number, seller_name, invoice_date) key was
 * already seen earlier in the batch. The first occurrence is the canonical
 * one and is never flagged. Only the current batch is considered.
 */
export const duplicateInvoiceDetector: BatchRule = {
  id: RULE_ID,
  category: 'anomaly',
  evaluate(batch) {
    const firstSeenAt = new Map<string, number>();
    const flagged = new Map<number, Violation[]>();

    batch.forEach((invoice, index) => {
      if (invoice === null) return;
      const key = duplicateKey(invoice);
      if (key === null) return;

      const first = firstSeenAt.get(key);
      if (first === undefined) {
        firstSeenAt.set(key, index);
        return;
      }

      flagged.set(index, [
        {
          rule_id: RULE_ID,
          category: 'anomaly',
          field: 'invoice_number',
          message: `duplicate invoice detected: ${invoice.invoice_number ?? ''} (first seen at index ${first})`,
          severity: 'error',
        },
      ]);
    });

    return flagged;
  },
};

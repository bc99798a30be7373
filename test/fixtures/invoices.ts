import { invoiceRecordSchema } from '../../src/domain/schemas.js';
import type { Invoice } from '../../src/domain/types.js';

/** A complete, internally consistent invoice record as it would arrive as JSON. */
export function invoiceRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    invoice_number: 'INV-1001',
    customer_number: 'C-42',
    order_reference: 'PO-7',
    buyer_name: 'Example Buyer GmbH',
    buyer_address: 'Teststrasse 1, 12345 Berlin',
    seller_name: 'Acme Supplies AG',
    seller_address: 'Industriestrasse 3, 50667 Koeln',
    invoice_date: '2024-05-22',
    due_date: '2024-06-21',
    delivery_date: '2024-05-30',
    currency: 'EUR',
    net_total: 100,
    tax_rate: 19,
    tax_amount: 19,
    gross_total: 119,
    payment_terms: '30 days net',
    line_items: [
      { position: 1, description: 'USB mouse', article_number: 'A-1', quantity: 4, unit: 'pcs', unit_price: 16, line_total: 64 },
      { position: 2, description: 'Keyboard', article_number: 'A-2', quantity: 1, unit: 'pcs', unit_price: 36, line_total: 36 },
    ],
    ...overrides,
  };
}

export function lineItem(lineTotal: unknown, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { description: 'Item', quantity: 1, unit: 'pcs', unit_price: lineTotal, line_total: lineTotal, ...overrides };
}

/** Parsed form of `invoiceRecord(overrides)`, ready for calling a rule directly. */
export function invoice(overrides: Record<string, unknown> = {}): Invoice {
  return invoiceRecordSchema.parse(invoiceRecord(overrides));
}

import { z } from 'zod';
import type { Amount, Invoice, LineItem } from './types.js';

const DECIMAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;
const INTEGER_PATTERN = /^\d+$/;

function toText(value: string | number | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  return String(value);
}

function toAmount(value: string | number | null | undefined): Amount {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return value;

  const trimmed = value.trim();
  if (trimmed === '') return null;
  return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : trimmed;
}

/** A usable line position, or null so the record schema numbers the line itself. */
function toPosition(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const position = Number(value.trim());
    return position > 0 ? position : null;
  }
  return null;
}

const textField = z.union([z.string(), z.number()]).nullish().transform(toText);

// Numbers are kept as text so date_format_valid reports them.
const dateField = z.union([z.string(), z.number()]).nullish().transform(toText);

const amountField = z.union([z.number(), z.string()]).nullish().transform(toAmount);

export const lineItemSchema = z.object({
  position: z.union([z.number(), z.string()]).nullish().transform(toPosition),
  description: textField,
  article_number: textField,
  quantity: amountField,
  unit: textField,
  unit_price: amountField,
  line_total: amountField,
});

/**
 * Lenient shape of an invoice record: every field may be missing or null, and
 * amounts may be numeric strings. Only structural problems (wrong JSON types)
 * fail to parse.
 */
export const invoiceRecordSchema = z
  .object({
    invoice_number: textField,
    customer_number: textField,
    order_reference: textField,

    buyer_name: textField,
    buyer_address: textField,
    seller_name: textField,
    seller_address: textField,

    invoice_date: dateField,
    due_date: dateField,
    delivery_date: dateField,

    currency: textField,
    net_total: amountField,
    tax_rate: amountField,
    tax_amount: amountField,
    gross_total: amountField,

    payment_terms: textField,

    line_items: z.array(lineItemSchema).nullish(),

    source_file: z.string().nullish(),
  })
  .transform((record): Invoice => ({
    ...record,
    source_file: record.source_file ?? null,
    line_items: (record.line_items ?? []).map(
      (item, index): LineItem => ({ ...item, position: item.position ?? index + 1 }),
    ),
  }));

export const validateJsonInput = z.array(z.unknown());

export const pdfDocumentInput = z.object({
  filename: z
    .string()
    .min(1, 'Filename is required')
    .refine((name) => name.toLowerCase().endsWith('.pdf'), 'Only PDF files are supported'),
  pdfBase64: z.string().min(1, 'PDF data is required'),
});

export const extractAndValidateInput = z.object({
  files: z.array(pdfDocumentInput).min(1, 'At least one file is required').max(20, 'At most 20 files per request'),
});

export type InvoiceRecordInput = z.input<typeof invoiceRecordSchema>;
export type ExtractAndValidateInput = z.infer<typeof extractAndValidateInput>;

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

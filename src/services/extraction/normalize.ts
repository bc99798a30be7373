const TEXT_FIELDS = [
  'invoice_number',
  'customer_number',
  'order_reference',
  'buyer_name',
  'buyer_address',
  'seller_name',
  'seller_address',
  'payment_terms',
] as const;

const DATE_FIELDS = ['invoice_date', 'due_date', 'delivery_date'] as const;
const AMOUNT_FIELDS = ['net_total', 'tax_rate', 'tax_amount', 'gross_total'] as const;

const LINE_TEXT_FIELDS = ['description', 'article_number', 'unit'] as const;
const LINE_AMOUNT_FIELDS = ['quantity', 'unit_price', 'line_total'] as const;

const GERMAN_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const DECIMAL_COMMA = /^[+-]?\d{1,3}(\.\d{3})*,\d+$|^[+-]?\d+,\d+$/;
const PLAIN_DECIMAL = /^[+-]?\d+(\.\d+)?$/;

function normalizeText(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/** `DD.MM.YYYY` → `YYYY-MM-DD`; anything else is left for the format rules to judge. */
export function normalizeDate(value: unknown): unknown {
  const text = normalizeText(value);
  if (typeof text !== 'string') return text;

  const match = GERMAN_DATE.exec(text);
  if (!match) return text;

  const [, day, month, year] = match;
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

/** Reads `1.234,56` and `64,00` as well as `1234.56`; other strings pass through unchanged. */
export function normalizeAmount(value: unknown): unknown {
  const text = normalizeText(value);
  if (typeof text !== 'string') return text;

  const compact = text.replace(/\s+/g, '');
  if (DECIMAL_COMMA.test(compact)) {
    return Number(compact.replace(/\./g, '').replace(',', '.'));
  }
  if (PLAIN_DECIMAL.test(compact)) {
    return Number(compact);
  }
  return text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeLineItem(item: unknown): unknown {
  if (!isRecord(item)) return item;

  const normalized: Record<string, unknown> = { ...item };
  for (const field of LINE_TEXT_FIELDS) normalized[field] = normalizeText(item[field]);
  for (const field of LINE_AMOUNT_FIELDS) normalized[field] = normalizeAmount(item[field]);
  return normalized;
}

/**
 * Cleans raw extractor output into the shape the invoice record schema reads.
 * Only representation changes here; values are never invented or corrected.
 */
export function normalizeExtractedInvoice(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = { ...raw };

  for (const field of TEXT_FIELDS) normalized[field] = normalizeText(raw[field]);
  for (const field of DATE_FIELDS) normalized[field] = normalizeDate(raw[field]);
  for (const field of AMOUNT_FIELDS) normalized[field] = normalizeAmount(raw[field]);

  const currency = normalizeText(raw.currency);
  normalized.currency = typeof currency === 'string' ? currency.toUpperCase() : currency;

  normalized.line_items = Array.isArray(raw.line_items) ? raw.line_items.map(normalizeLineItem) : raw.line_items;

  return normalized;
}

export const RULE_CATEGORIES = ['completeness', 'format', 'business', 'anomaly'] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export const SEVERITIES = ['error', 'warning'] as const;

export type Severity = (typeof SEVERITIES)[number];

export const DEFAULT_KNOWN_CURRENCIES = ['EUR', 'USD', 'GBP', 'INR', 'JPY', 'CHF'] as const;

/**
 * A decimal as it arrived on the record. Numeric input is carried as a number;
 * a string means the value was present but could not be read as a number.
 */
export type Amount = number | string | null;

export interface LineItem {
  position: number;
  description: string | null;
  article_number: string | null;
  quantity: Amount;
  unit: string | null;
  unit_price: Amount;
  line_total: Amount;
}

export interface Invoice {
  // Identifiers
  invoice_number: string | null;
  customer_number: string | null;
  order_reference: string | null;

  // Parties
  buyer_name: string | null;
  buyer_address: string | null;
  seller_name: string | null;
  seller_address: string | null;

  // Dates (ISO 8601, YYYY-MM-DD)
  invoice_date: string | null;
  due_date: string | null;
  delivery_date: string | null;

  // Money
  currency: string | null;
  net_total: Amount;
  tax_rate: Amount;
  tax_amount: Amount;
  gross_total: Amount;

  payment_terms: string | null;

  /** Document order; never re-sorted. */
  line_items: LineItem[];

  source_file: string | null;
}

export interface Violation {
  rule_id: string;
  category: RuleCategory;
  field: string | null;
  message: string;
  severity: Severity;
}

export interface ValidationResult {
  invoice_ref: string;
  source_file?: string;
  is_valid: boolean;
  violations: Violation[];
}

export interface ValidationSummary {
  total: number;
  valid: number;
  invalid: number;
  error_frequency: Record<string, number>;
}

export interface ValidationReport {
  results: ValidationResult[];
  summary: ValidationSummary;
}

export interface PdfDocumentInput {
  filename: string;
  pdfBase64: string;
}

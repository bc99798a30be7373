import type { Invoice } from '../../domain/types.js';

export interface ExtractionResult {
  invoice: Invoice;
  rawResponse: string;
  model: string;
  latencyMs: number;
}

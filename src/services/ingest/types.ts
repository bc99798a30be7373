import type { AppError } from '../../domain/errors.js';
import type { Invoice } from '../../domain/types.js';

export interface IngestOptions {
  batchId?: string;
  maxSizeBytes?: number;
  /** Skip documents that fail instead of stopping at the first failure. */
  continueOnError?: boolean;
}

export interface IngestFailure {
  filename: string;
  error: AppError;
}

export interface IngestResult {
  invoices: Invoice[];
  failures: IngestFailure[];
}

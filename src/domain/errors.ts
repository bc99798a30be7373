export const ErrorCode = {
  // PDF Parsing
  PDF_PARSE_FAILED: 'PDF_PARSE_FAILED',
  PDF_EMPTY: 'PDF_EMPTY',
  PDF_TOO_LARGE: 'PDF_TOO_LARGE',

  // LLM Extraction
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',
  EXTRACTION_INVALID_RECORD: 'EXTRACTION_INVALID_RECORD',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',

  // Input
  INPUT_INVALID_JSON: 'INPUT_INVALID_JSON',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Files
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',

  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}


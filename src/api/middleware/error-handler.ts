import type { Request, Response, NextFunction } from 'express';
import type { AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

function isBodyParseError(value: unknown): value is Error & { type: string } {
  return value instanceof Error && 'type' in value && value.type === 'entity.parse.failed';
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case 'PDF_PARSE_FAILED':
    case 'PDF_EMPTY':
    case 'PDF_TOO_LARGE':
    case 'LLM_AUTH_ERROR':
    case 'INPUT_INVALID_JSON':
      return 400;

    case 'VALIDATION_ERROR':
    case 'EXTRACTION_INVALID_RECORD':
      return 422;

    case 'LLM_API_ERROR':
    case 'LLM_RATE_LIMITED':
    case 'LLM_MALFORMED_RESPONSE':
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(errorResponse('INPUT_INVALID_JSON', 'Request body is not valid JSON', err.message, false));
    return;
  }

  logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  res.status(500).json(errorResponse('INTERNAL_ERROR', 'An unexpected error occurred', undefined, false));
}

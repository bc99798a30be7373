import { z } from 'zod';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { describeIssues } from '../domain/schemas.js';
import { DEFAULT_KNOWN_CURRENCIES } from '../domain/types.js';

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GROQ_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).optional(),
  KNOWN_CURRENCIES: z
    .string()
    .optional()
    .transform((raw) =>
      raw === undefined || raw.trim() === ''
        ? [...DEFAULT_KNOWN_CURRENCIES]
        : raw.split(',').map((code) => code.trim()).filter((code) => code !== ''),
    ),
  MAX_PDF_SIZE_MB: z.coerce.number().positive().default(10),
});

export interface AppConfig {
  port: number;
  logLevel: string;
  groqApiKey?: string;
  llmModel?: string;
  knownCurrencies: readonly string[];
  maxPdfSizeBytes: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Result<AppConfig, AppError> {
  // Empty strings from .env files mean "not set".
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = configSchema.safeParse(present);

  if (!parsed.success) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid environment configuration', false, describeIssues(parsed.error)));
  }

  const c = parsed.data;
  return ok({
    port: c.PORT,
    logLevel: c.LOG_LEVEL,
    groqApiKey: c.GROQ_API_KEY,
    llmModel: c.LLM_MODEL,
    knownCurrencies: Object.freeze(c.KNOWN_CURRENCIES),
    maxPdfSizeBytes: Math.round(c.MAX_PDF_SIZE_MB * 1024 * 1024),
  });
}

import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions } from './types.js';

export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';
const MAX_TOKENS = 4096;

const log = logger.child({ module: 'llm-groq' });

type ChatMessage = { role: 'system' | 'user'; content: string };

/** The slice of the groq-sdk client this provider calls. */
export interface GroqClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
        max_tokens: number;
        response_format?: { type: 'json_object' };
      }): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

interface FailureClass {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

function statusOf(cause: unknown): number | undefined {
  if (typeof cause !== 'object' || cause === null || !('status' in cause)) return undefined;
  const { status } = cause;
  return typeof status === 'number' ? status : undefined;
}

export function classifyGroqFailure(status: number | undefined): FailureClass {
  if (status === undefined) {
    return { code: ErrorCode.LLM_API_ERROR, message: 'Groq API call failed', retryable: true };
  }
  if (status === 401 || status === 403) {
    return { code: ErrorCode.LLM_AUTH_ERROR, message: 'Groq rejected the API key', retryable: false };
  }
  if (status === 429) {
    return { code: ErrorCode.LLM_RATE_LIMITED, message: 'Groq rate limit reached', retryable: true };
  }
  if (status >= 500) {
    return { code: ErrorCode.LLM_API_ERROR, message: `Groq API returned ${status}`, retryable: true };
  }
  return { code: ErrorCode.LLM_API_ERROR, message: `Groq rejected the request (${status})`, retryable: false };
}

/** Single-turn, deterministic chat against Groq's completion endpoint. */
export class GroqProvider implements LLMProvider {
  constructor(
    private readonly client: GroqClient,
    private readonly model: string = DEFAULT_GROQ_MODEL,
  ) {}

  async chat(
    systemPrompt: string,
    userMessage: string,
    options: LLMRequestOptions = {},
  ): Promise<Result<LLMResponse, AppError>> {
    const startedAt = Date.now();

    let completion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userMessage },
        ],
        temperature: 0,
        max_tokens: MAX_TOKENS,
        ...(options.responseFormat === 'json' && { response_format: { type: 'json_object' } }),
      });
    } catch (cause) {
      const status = statusOf(cause);
      const failure = classifyGroqFailure(status);
      const details = cause instanceof Error ? cause.message : String(cause);

      log.warn(
        { model: this.model, status, errorCode: failure.code, retryable: failure.retryable, details },
        'Groq request failed',
      );
      return err(createAppError(failure.code, failure.message, failure.retryable, details));
    }

    const latencyMs = Date.now() - startedAt;
    const content = completion.choices[0]?.message?.content;
    if (!content) {
      log.warn({ model: this.model, latencyMs }, 'Groq answered without content');
      return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Groq returned empty response content', false));
    }

    const { usage } = completion;
    log.debug({ model: completion.model, latencyMs, totalTokens: usage?.total_tokens }, 'Groq completion received');

    return ok({
      content,
      model: completion.model,
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs,
    });
  }
}

import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export type ResponseFormat = 'json' | 'text';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** One completed chat call: the first choice's text plus call metadata. */
export interface LLMResponse {
  content: string;
  /** Model id as reported by the provider, which may differ from the one requested. */
  model: string;
  usage: TokenUsage;
  latencyMs: number;
}

export interface LLMRequestOptions {
  /** `json` asks the provider for a single JSON object; the caller still parses it. */
  responseFormat?: ResponseFormat;
}

/** Single-turn chat. Provider failures come back as `err`, never as a rejection. */
export interface LLMProvider {
  chat(systemPrompt: string, userMessage: string, options?: LLMRequestOptions): Promise<Result<LLMResponse, AppError>>;
}

export interface LLMProviderConfig {
  provider: 'groq';
  apiKey: string;
  model?: string;
}

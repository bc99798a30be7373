export type { LLMProvider, LLMResponse, LLMRequestOptions, LLMProviderConfig, ResponseFormat, TokenUsage } from './types.js';
export { GroqProvider, DEFAULT_GROQ_MODEL, classifyGroqFailure } from './groq.js';
export type { GroqClient } from './groq.js';

import Groq from 'groq-sdk';
import { loadConfig } from '../config.js';
import { GroqProvider } from './groq.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'groq':
      return new GroqProvider(new Groq({ apiKey: config.apiKey }), config.model);
    default:
      throw new Error(`Unsupported LLM provider: ${String(config.provider)}`);
  }
}

let instance: LLMProvider | null = null;

/**
 * Shared provider built from the environment on first use.
 * @throws {Error} If the configuration is invalid or GROQ_API_KEY is not set
 */
export function getLlm(): LLMProvider {
  if (instance) return instance;

  const configResult = loadConfig();
  if (!configResult.ok) {
    throw new Error(`${configResult.error.message}: ${configResult.error.details ?? ''}`);
  }

  const { groqApiKey, llmModel } = configResult.value;
  if (!groqApiKey) {
    throw new Error('GROQ_API_KEY environment variable is not set');
  }

  instance = createLLMProvider({ provider: 'groq', apiKey: groqApiKey, model: llmModel });
  return instance;
}

import type { AppConfig } from './config.js';
import { getAnthropicClient } from './anthropic.js';
import {
  AnthropicProvider,
  OpenAICompatibleProvider,
  type GenerativeModel,
} from './llm-provider.js';

/**
 * Build the configured model provider.
 * The Anthropic client is created on first use so a missing key only fails
 * the first generation, not startup.
 */
export function createModel(config: AppConfig['model']): GenerativeModel {
  if (config.provider === 'openai-compatible') {
    if (!config.apiKey) {
      throw new Error('LLM_API_KEY environment variable is required when LLM_PROVIDER=openai-compatible');
    }
    return new OpenAICompatibleProvider({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      model: config.model,
    });
  }

  return new AnthropicProvider(() => getAnthropicClient(config.apiKey), config.model);
}

export function hasModelCredentials(config: AppConfig['model']): boolean {
  return Boolean(config.apiKey);
}

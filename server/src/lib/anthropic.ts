import Anthropic from '@anthropic-ai/sdk';

let anthropicClient: Anthropic | null = null;
let clientKey: string | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(apiKey: string | undefined): Anthropic {
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY environment variable is required when LLM_PROVIDER=anthropic');
  }
  if (!anthropicClient || clientKey !== apiKey) {
    // Retries are owned by the model gateway, not the SDK.
    anthropicClient = new Anthropic({ apiKey, maxRetries: 0 });
    clientKey = apiKey;
  }
  return anthropicClient;
}

/**
 * Concatenate the text blocks of an Anthropic Messages API response.
 */
export function extractResponseText(response: Anthropic.Message): string {
  let text = '';
  for (const block of response.content) {
    if (block.type === 'text') text += block.text;
  }
  return text;
}

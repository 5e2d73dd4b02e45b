import { z } from 'zod';
import type Anthropic from '@anthropic-ai/sdk';
import { extractResponseText } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
}

export interface GenerateInput {
  system: string;
  prompt: string;
  params: GenerationParams;
}

export interface GenerateOutput {
  text: string;
  /** The provider stopped because it hit the token limit. */
  truncated: boolean;
  usage: { input_tokens: number; output_tokens: number };
}

/**
 * An external text-generation capability. Implementations throw on failure;
 * thrown errors carry `status`, `code` or `headers` where the provider
 * supplies them so the gateway can classify them.
 */
export interface GenerativeModel {
  readonly name: string;
  generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput>;
}

/** HTTP failure from a model endpoint. */
export class ModelHttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly headers?: Headers,
  ) {
    super(message);
    this.name = 'ModelHttpError';
  }
}

/** The provider refused to produce content for policy reasons. */
export class ContentPolicyError extends Error {
  readonly contentPolicy = true;

  constructor(message: string) {
    super(message);
    this.name = 'ContentPolicyError';
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements GenerativeModel {
  readonly name = 'anthropic';

  constructor(
    private readonly client: () => Anthropic,
    private readonly model: string,
  ) {}

  async generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput> {
    const response = await this.client().messages.create(
      {
        model: this.model,
        max_tokens: input.params.maxTokens,
        temperature: input.params.temperature,
        system: input.system,
        messages: [{ role: 'user', content: input.prompt }],
      },
      { signal },
    );

    return {
      text: extractResponseText(response),
      truncated: response.stop_reason === 'max_tokens',
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

const OpenAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export class OpenAICompatibleProvider implements GenerativeModel {
  readonly name = 'openai-compatible';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
  }

  async generate(input: GenerateInput, signal: AbortSignal): Promise<GenerateOutput> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: input.params.maxTokens,
        temperature: input.params.temperature,
        messages: [
          { role: 'system', content: input.system },
          { role: 'user', content: input.prompt },
        ],
        stream: false,
      }),
      signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new ModelHttpError(
        `Model API error ${response.status}: ${errText.substring(0, 500)}`,
        response.status,
        response.headers,
      );
    }

    const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      // Malformed envelope from the endpoint, typically a proxy error page.
      throw new ModelHttpError('Model API returned an unexpected response body', 502);
    }

    const choice = parsed.data.choices[0];
    if (choice.finish_reason === 'content_filter') {
      throw new ContentPolicyError('Model API rejected the request under its content policy');
    }

    return {
      text: choice.message.content ?? '',
      truncated: choice.finish_reason === 'length',
      usage: {
        input_tokens: parsed.data.usage?.prompt_tokens ?? 0,
        output_tokens: parsed.data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

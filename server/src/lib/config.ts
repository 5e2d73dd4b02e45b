import { z } from 'zod';
import { deepFreeze } from './freeze.js';

export type ProviderName = 'anthropic' | 'openai-compatible';
export type PageSize = 'letter' | 'a4';

const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';
const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:5174', 'http://localhost:5175'];

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

function envBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

const ConfigSchema = z.object({
  model: z.object({
    provider: z.enum(['anthropic', 'openai-compatible']),
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    maxTokens: positiveInt.max(64_000),
    temperature: z.coerce.number().min(0).max(2),
  }),
  retry: z.object({
    maxAttempts: positiveInt.max(10),
    baseDelayMs: nonNegativeInt,
    factor: z.coerce.number().min(1),
    maxDelayMs: positiveInt,
  }),
  defaultDeadlineMs: positiveInt,
  parser: z.object({
    coverLetterMinBodyChars: nonNegativeInt,
    coverLetterMinParagraphs: positiveInt,
    minAnswerChars: positiveInt,
    allowExtraSections: z.boolean(),
  }),
  document: z.object({
    pageSize: z.enum(['letter', 'a4']),
    marginPt: positiveInt.max(200),
    fontSize: positiveInt.max(36),
    lineHeight: positiveInt.max(72),
  }),
  server: z.object({
    port: positiveInt.max(65_535),
    allowedOrigins: z.array(z.string()),
    maxBodyBytes: positiveInt,
    metricsKey: z.string().optional(),
  }),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;
export type RetryPolicy = AppConfig['retry'];
export type ParserPolicy = AppConfig['parser'];
export type DocumentLayoutConfig = AppConfig['document'];

type Env = Record<string, string | undefined>;

function resolveProvider(env: Env): ProviderName {
  const configured = env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'anthropic' || configured === 'openai-compatible') return configured;
  return env.LLM_API_KEY && env.LLM_BASE_URL ? 'openai-compatible' : 'anthropic';
}

/**
 * Build the immutable service configuration from environment variables.
 * Throws with the offending variable paths when a value is invalid.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const provider = resolveProvider(env);
  const isProduction = env.NODE_ENV === 'production';

  const raw = {
    model: {
      provider,
      apiKey: provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.LLM_API_KEY,
      baseUrl: env.LLM_BASE_URL ?? DEFAULT_OPENAI_BASE_URL,
      model: env.LLM_MODEL ?? (provider === 'anthropic' ? DEFAULT_ANTHROPIC_MODEL : DEFAULT_OPENAI_MODEL),
      maxTokens: env.LLM_MAX_TOKENS ?? 4096,
      temperature: env.LLM_TEMPERATURE ?? 0.4,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS ?? 3,
      baseDelayMs: env.RETRY_BASE_DELAY_MS ?? 500,
      factor: env.RETRY_FACTOR ?? 2,
      maxDelayMs: env.RETRY_MAX_DELAY_MS ?? 8_000,
    },
    defaultDeadlineMs: env.REQUEST_DEADLINE_MS ?? 120_000,
    parser: {
      coverLetterMinBodyChars: env.COVER_LETTER_MIN_BODY_CHARS ?? 200,
      coverLetterMinParagraphs: env.COVER_LETTER_MIN_PARAGRAPHS ?? 2,
      minAnswerChars: env.MIN_ANSWER_CHARS ?? 1,
      allowExtraSections: envBool(env.ALLOW_EXTRA_SECTIONS, false),
    },
    document: {
      pageSize: env.DOCUMENT_PAGE_SIZE ?? 'letter',
      marginPt: env.DOCUMENT_MARGIN_PT ?? 54,
      fontSize: env.DOCUMENT_FONT_SIZE ?? 10,
      lineHeight: env.DOCUMENT_LINE_HEIGHT ?? 14,
    },
    server: {
      port: env.PORT ?? 3001,
      allowedOrigins: env.ALLOWED_ORIGINS
        ? env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
        : isProduction
          ? []
          : DEV_ORIGINS,
      maxBodyBytes: env.MAX_REQUEST_BODY_BYTES ?? 262_144,
      metricsKey: env.METRICS_KEY || undefined,
    },
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return deepFreeze(parsed.data);
}

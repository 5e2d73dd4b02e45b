import { afterEach, describe, it, expect, vi } from 'vitest';
import { classifyError } from '../lib/retry.js';
import { createModel, hasModelCredentials } from '../lib/llm.js';
import { ContentPolicyError, ModelHttpError, OpenAICompatibleProvider } from '../lib/llm-provider.js';
import { testConfig } from './helpers/fixtures.js';

const input = { system: 'sys', prompt: 'hello', params: { maxTokens: 256, temperature: 0.1 } };

function provider() {
  return new OpenAICompatibleProvider({ apiKey: 'test-secret', baseUrl: 'http://model.local/v1/', model: 'test-model' });
}

function stubFetch(response: Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function completion(content: string | null, finishReason: string) {
  return Response.json({
    choices: [{ message: { content }, finish_reason: finishReason }],
    usage: { prompt_tokens: 12, completion_tokens: 34 },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAICompatibleProvider', () => {
  it('posts a chat completion request and returns the text', async () => {
    const fetchMock = stubFetch(completion('{"ok":true}', 'stop'));

    const output = await provider().generate(input, new AbortController().signal);

    expect(output).toEqual({ text: '{"ok":true}', truncated: false, usage: { input_tokens: 12, output_tokens: 34 } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://model.local/v1/chat/completions');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      max_tokens: 256,
      temperature: 0.1,
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hello' },
      ],
      stream: false,
    });
  });

  it('flags output cut off at the token limit', async () => {
    stubFetch(completion('{"partial":', 'length'));
    const output = await provider().generate(input, new AbortController().signal);
    expect(output.truncated).toBe(true);
  });

  it('throws a classifiable ModelHttpError for HTTP failures', async () => {
    stubFetch(new Response('slow down', { status: 429, headers: { 'retry-after': '1' } }));

    const error = await provider().generate(input, new AbortController().signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelHttpError);
    expect(error).toMatchObject({ status: 429, message: 'Model API error 429: slow down' });
    expect(classifyError(error)).toBe('transient');
  });

  it('treats a malformed envelope as a bad gateway', async () => {
    stubFetch(Response.json({ unexpected: true }));
    await expect(provider().generate(input, new AbortController().signal)).rejects.toMatchObject({ status: 502 });
  });

  it('raises ContentPolicyError for filtered completions', async () => {
    stubFetch(completion(null, 'content_filter'));
    const error = await provider().generate(input, new AbortController().signal).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ContentPolicyError);
    expect(classifyError(error)).toBe('permanent');
  });
});

describe('createModel', () => {
  it('builds the provider named in the configuration', () => {
    expect(createModel(testConfig().model).name).toBe('anthropic');
    const openai = testConfig({ LLM_PROVIDER: 'openai-compatible', LLM_API_KEY: 'test-secret' });
    expect(createModel(openai.model).name).toBe('openai-compatible');
  });

  it('requires a key for the OpenAI-compatible provider', () => {
    const config = testConfig({ LLM_PROVIDER: 'openai-compatible' });
    expect(() => createModel(config.model)).toThrow('LLM_API_KEY environment variable is required');
    expect(hasModelCredentials(config.model)).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.model.provider).toBe('anthropic');
    expect(config.model.apiKey).toBeUndefined();
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, factor: 2, maxDelayMs: 8_000 });
    expect(config.defaultDeadlineMs).toBe(120_000);
    expect(config.parser.allowExtraSections).toBe(false);
    expect(config.document).toEqual({ pageSize: 'letter', marginPt: 54, fontSize: 10, lineHeight: 14 });
    expect(config.server.port).toBe(3001);
    expect(config.server.allowedOrigins).toContain('http://localhost:5173');
  });

  it('selects the OpenAI-compatible provider when its credentials are present', () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret', LLM_BASE_URL: 'http://localhost:8080/v1' });
    expect(config.model).toMatchObject({
      provider: 'openai-compatible',
      apiKey: 'test-secret',
      baseUrl: 'http://localhost:8080/v1',
      model: 'gpt-4o-mini',
    });
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-secret',
      RETRY_MAX_ATTEMPTS: '5',
      REQUEST_DEADLINE_MS: '30000',
      ALLOW_EXTRA_SECTIONS: 'true',
      DOCUMENT_PAGE_SIZE: 'a4',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example',
    });
    expect(config.model.apiKey).toBe('test-secret');
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.defaultDeadlineMs).toBe(30_000);
    expect(config.parser.allowExtraSections).toBe(true);
    expect(config.document.pageSize).toBe('a4');
    expect(config.server.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });

  it('has no default origins in production', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).server.allowedOrigins).toEqual([]);
  });

  it('names the setting path of an invalid value', () => {
    expect(() => loadConfig({ RETRY_MAX_ATTEMPTS: '0' })).toThrow(/retry\.maxAttempts/);
    expect(() => loadConfig({ DOCUMENT_PAGE_SIZE: 'legal' })).toThrow(/document\.pageSize/);
  });

  it('returns a frozen configuration', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });
});

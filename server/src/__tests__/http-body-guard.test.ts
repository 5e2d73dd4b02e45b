import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { errorBody, parseJsonBodyWithLimit } from '../lib/http-body-guard.js';

function createApp(maxBytes: number) {
  const app = new Hono();
  app.post('/echo', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, maxBytes);
    if (!parsed.ok) return parsed.response;
    return c.json({ received: parsed.data });
  });
  return app;
}

function post(body: string, headers: Record<string, string> = { 'Content-Type': 'application/json' }) {
  return { method: 'POST', body, headers };
}

describe('parseJsonBodyWithLimit', () => {
  it('parses a JSON body within the limit', async () => {
    const res = await createApp(1_000).request('http://test/echo', post('{"ok":true}'));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ received: { ok: true } });
  });

  it('accepts a JSON content type with a charset', async () => {
    const res = await createApp(1_000).request(
      'http://test/echo',
      post('[1,2]', { 'Content-Type': 'application/json; charset=utf-8' }),
    );
    expect(await res.json()).toEqual({ received: [1, 2] });
  });

  it('rejects a declared Content-Length over the limit before reading', async () => {
    const res = await createApp(50).request(
      'http://test/echo',
      post('{}', { 'Content-Type': 'application/json', 'Content-Length': '200' }),
    );
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual(errorBody('payload_too_large', 'Request too large (max 50 bytes)'));
  });

  it('rejects a streamed body that outgrows the limit', async () => {
    const res = await createApp(10).request('http://test/echo', post(JSON.stringify({ text: 'x'.repeat(100) })));
    expect(res.status).toBe(413);
  });

  it('rejects a non-JSON content type with 415', async () => {
    const res = await createApp(1_000).request('http://test/echo', post('hello', { 'Content-Type': 'text/plain' }));
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual(
      errorBody('unsupported_media_type', 'Unsupported content type. Use application/json.'),
    );
  });

  it('rejects malformed JSON with invalid_input', async () => {
    const res = await createApp(1_000).request('http://test/echo', post('{"broken":'));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual(errorBody('invalid_input', 'Request body is not valid JSON'));
  });
});

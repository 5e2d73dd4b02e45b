import type { Context } from 'hono';
import logger from './logger.js';

export interface ErrorBody {
  error: { kind: string; message: string; retryable: boolean };
}

export function errorBody(kind: string, message: string, retryable = false): ErrorBody {
  return { error: { kind, message, retryable } };
}

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json(errorBody('payload_too_large', `Request too large (max ${maxBytes} bytes)`), 413);
}

export function rejectOversizedJsonBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return tooLarge(c, maxBytes);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json(errorBody('invalid_input', 'Request body is not readable'), 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch((err: unknown) => {
          logger.debug({ err }, 'Failed to cancel oversized request body');
        });
        return { ok: false, response: tooLarge(c, maxBytes) };
      }
      chunks.push(value);
    }
  } catch (err) {
    logger.debug({ err }, 'Failed to read request body');
    return { ok: false, response: c.json(errorBody('invalid_input', 'Failed to read request body'), 400) };
  }

  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }

  return { ok: true, raw: new TextDecoder().decode(merged) };
}

/**
 * Parse a JSON body with an actual byte-size guard, so the limit holds even
 * when Content-Length is absent or wrong.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedJsonBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (!contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json(errorBody('unsupported_media_type', 'Unsupported content type. Use application/json.'), 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json(errorBody('invalid_input', 'Request body is not valid JSON'), 400) };
  }
}

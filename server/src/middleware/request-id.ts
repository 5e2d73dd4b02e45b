import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Accept a well-formed inbound X-Request-ID or mint one, and echo it back. */
export async function requestIdMiddleware(c: Context, next: Next) {
  const raw = c.req.header('X-Request-ID');
  let requestId: string = randomUUID();
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_PATTERN.test(candidate)) {
      requestId = candidate;
    }
  }
  c.set('requestId', requestId);
  await next();
  // Set after the handler so responses built outside the context carry it too
  c.header('X-Request-ID', requestId);
}

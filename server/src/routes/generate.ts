import { Hono, type Context } from 'hono';
import type { FailureKind } from '../lib/errors.js';
import { errorBody, parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import type { Pipeline } from '../pipeline/orchestrator.js';
import type { TaskKind } from '../pipeline/types.js';

export const FAILURE_STATUS: Record<FailureKind, number> = {
  invalid_input: 400,
  parse_error: 502,
  model_permanent: 502,
  model_transient: 503,
  deadline_exceeded: 504,
  // Client closed the request
  cancelled: 499,
  render_error: 500,
};

export interface GenerateRouteDeps {
  pipeline: Pipeline;
  maxBodyBytes: number;
}

function withTask(body: unknown, task: TaskKind): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return body;
  return { ...body, task };
}

export function createGenerateRoutes(deps: GenerateRouteDeps): Hono {
  const routes = new Hono();

  async function handle(c: Context, task?: TaskKind): Promise<Response> {
    const parsed = await parseJsonBodyWithLimit(c, deps.maxBodyBytes);
    if (!parsed.ok) return parsed.response;

    const body = task ? withTask(parsed.data, task) : parsed.data;
    const outcome = await deps.pipeline.run(body, {
      signal: c.req.raw.signal,
      requestId: c.get('requestId'),
    });

    const headers = new Headers();
    if (outcome.fingerprint) headers.set('X-Fingerprint', outcome.fingerprint);

    if (!outcome.ok) {
      const { kind, message, retryable } = outcome.error;
      headers.set('Content-Type', 'application/json');
      return new Response(JSON.stringify(errorBody(kind, message, retryable)), {
        status: FAILURE_STATUS[kind],
        headers,
      });
    }

    headers.set('Content-Type', outcome.output.contentType);
    headers.set('Content-Length', String(outcome.output.body.byteLength));
    // Copied into a fresh ArrayBuffer-backed view for the Response body
    return new Response(new Uint8Array(outcome.output.body), { status: 200, headers });
  }

  routes.post('/generate', (c) => handle(c));
  routes.post('/tailor-resume', (c) => handle(c, 'TAILOR_RESUME'));
  routes.post('/cover-letter', (c) => handle(c, 'COVER_LETTER'));
  routes.post('/answer-questions', (c) => handle(c, 'ANSWER_QUESTIONS'));

  return routes;
}

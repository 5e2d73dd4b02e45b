import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from './lib/config.js';
import { errorBody } from './lib/http-body-guard.js';
import { hasModelCredentials } from './lib/llm.js';
import logger from './lib/logger.js';
import { modelAttemptMetrics, requestMetrics, statusLabels } from './lib/metrics.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import type { Pipeline } from './pipeline/orchestrator.js';
import { createGenerateRoutes } from './routes/generate.js';

export interface AppDeps {
  config: AppConfig;
  pipeline: Pipeline;
  /** Reports whether the server is draining; new work is refused while it is. */
  isShuttingDown?: () => boolean;
}

const BYPASS_PATHS = new Set(['/health', '/metrics']);

export function createApp(deps: AppDeps): Hono {
  const { config, pipeline } = deps;
  const isShuttingDown = deps.isShuttingDown ?? (() => false);
  const isProduction = process.env.NODE_ENV === 'production';
  const startTime = Date.now();
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    let status = 500;
    try {
      if (isShuttingDown() && !BYPASS_PATHS.has(c.req.path)) {
        status = 503;
        return c.json(errorBody('unavailable', 'Server is restarting. Please retry shortly.', true), 503);
      }
      await next();
      status = c.res.status;
    } finally {
      requestMetrics.record(statusLabels(status), Date.now() - startedAt);
    }
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({
    origin: [...config.server.allowedOrigins],
    exposeHeaders: ['X-Request-ID', 'X-Fingerprint'],
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const credentials = hasModelCredentials(config.model);
    return c.json({
      status: isShuttingDown() ? 'draining' : credentials ? 'ok' : 'degraded',
      model: {
        provider: config.model.provider,
        model: config.model.model,
        credentials_present: credentials,
      },
      in_flight: pipeline.inFlight,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    const metricsKey = config.server.metricsKey;
    if (metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
        return c.json(errorBody('unauthorized', 'Unauthorized'), 401);
      }
    } else if (isProduction) {
      return c.json(errorBody('not_found', 'Not found'), 404);
    }

    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      shutting_down: isShuttingDown(),
      in_flight: pipeline.inFlight,
      http_runtime: requestMetrics.snapshot(),
      model_attempts: modelAttemptMetrics.snapshot(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  app.route('/api', createGenerateRoutes({ pipeline, maxBodyBytes: config.server.maxBodyBytes }));

  app.notFound((c) => c.json(errorBody('not_found', 'Not found'), 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ ...errorBody('internal_error', 'Internal server error'), request_id: requestId }, 500);
  });

  return app;
}

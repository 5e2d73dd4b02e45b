import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import { createModel } from './lib/llm.js';
import logger from './lib/logger.js';
import { createModelGateway } from './pipeline/model-gateway.js';
import { createPipeline } from './pipeline/orchestrator.js';

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Stop accepting connections; in-flight generations finish first
  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  const model = createModel(config.model);
  const gateway = createModelGateway({ model, retry: config.retry, logger });
  const pipeline = createPipeline({ config, gateway, logger });
  const app = createApp({ config, pipeline, isShuttingDown: () => shuttingDown });

  const { port } = config.server;
  logger.info({ port, provider: model.name, model: config.model.model }, 'Application tailoring service starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

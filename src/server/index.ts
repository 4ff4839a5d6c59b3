import { createServer } from 'http';
import type { Server } from 'http';
import { getEnv } from './config/env.js';
import { createApp } from './app.js';
import { createEnrichmentServices } from './services/enrichment/index.js';
import { logger } from './utils/logger.js';

const PURGE_INTERVAL_MS = 60 * 60 * 1000;
const SHUTDOWN_TIMEOUT_MS = 10000;

let httpServer: Server | null = null;
let purgeTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function start(): Promise<void> {
  const env = getEnv();
  const { engine, catalog } = createEnrichmentServices(env);

  // Connectivity problems are reported but do not block startup; the
  // pipelines surface them per dataset.
  try {
    await catalog.checkConnection();
    logger.info({ gmsUrl: env.DATAHUB_GMS_URL }, 'Catalog connection verified');
  } catch (error) {
    logger.warn({ error, gmsUrl: env.DATAHUB_GMS_URL }, 'Catalog connection check failed');
  }

  const app = createApp({
    engine,
    allowedOrigins: env.ALLOWED_ORIGINS,
    production: env.NODE_ENV === 'production',
  });

  purgeTimer = setInterval(() => {
    engine.purgeExpiredSuggestions()
      .then((removed) => {
        if (removed > 0) {
          logger.info({ removed }, 'Purged expired suggestions');
        }
      })
      .catch((error) => {
        logger.error({ error }, 'Failed to purge expired suggestions');
      });
  }, PURGE_INTERVAL_MS);
  purgeTimer.unref();

  httpServer = createServer(app);
  httpServer.keepAliveTimeout = 65000;

  await new Promise<void>((resolve, reject) => {
    httpServer?.once('error', reject);
    httpServer?.listen(env.PORT, () => resolve());
  });

  logger.info(
    { port: env.PORT, provider: env.LLM_PROVIDER, model: env.LLM_MODEL, concurrency: env.ENRICH_CONCURRENCY },
    'Enrichment server listening'
  );
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    logger.warn('Shutdown already in progress, forcing exit');
    process.exit(1);
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  if (purgeTimer) {
    clearInterval(purgeTimer);
  }

  const server = httpServer;
  if (server) {
    const closed = new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    const timeout = new Promise<never>((_resolve, reject) => {
      setTimeout(() => reject(new Error('Timed out waiting for connections to close')), SHUTDOWN_TIMEOUT_MS).unref();
    });
    await Promise.race([closed, timeout]);
  }

  logger.info('Shutdown complete');
  process.exit(0);
}

// Graceful shutdown signal handlers
process.on('SIGTERM', () => {
  gracefulShutdown('SIGTERM').catch((error) => {
    logger.error({ error }, 'Error in SIGTERM handler - forcing exit');
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  gracefulShutdown('SIGINT').catch((error) => {
    logger.error({ error }, 'Error in SIGINT handler - forcing exit');
    process.exit(1);
  });
});

start().catch((error) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});

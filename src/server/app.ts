import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createEnrichmentRouter } from './routes/enrichmentRoutes.js';
import type { EnrichmentEngine } from './services/enrichment/EnrichmentEngine.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  engine: EnrichmentEngine;
  /** Comma-separated list; when empty every origin is allowed outside production */
  allowedOrigins?: string;
  production?: boolean;
}

function buildCorsOptions(allowedOrigins: string | undefined, production: boolean): CorsOptions {
  const origins = (allowedOrigins ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    origin: (origin, callback) => {
      // Requests without an origin (curl, the CLI, server-to-server)
      if (!origin || origins.includes(origin)) {
        callback(null, true);
        return;
      }
      if (!production && origins.length === 0) {
        callback(null, true);
        return;
      }
      logger.warn({ origin, allowedOrigins: origins }, 'CORS: Origin not allowed');
      callback(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
  };
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(helmet());
  app.use(cors(buildCorsOptions(options.allowedOrigins, options.production ?? false)));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/enrichment', createEnrichmentRouter(options.engine));

  // 404 handler for unmatched routes (must be after all routes)
  app.use(notFoundHandler);

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { EnrichmentEngine } from '../services/enrichment/EnrichmentEngine.js';
import { asyncHandler, throwIfNotFound } from '../utils/errorHandling.js';
import { validate } from '../middleware/validation.js';
import {
  applySuggestionsBodySchema,
  datasetIdParamsSchema,
  enrichBatchBodySchema,
  suggestionIdParamsSchema,
} from '../validation/enrichmentSchemas.js';
import type { ApplySuggestionsBody, EnrichBatchBody } from '../validation/enrichmentSchemas.js';
import { CircuitState } from '../utils/circuitBreaker.js';

const applyOneBodySchema = z.object({
  override: z.boolean().optional().default(false),
});

export interface ClosableResponse {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Signal that aborts when the client disconnects before the response was sent
 */
export function abortOnDisconnect(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Dataset identifiers are catalog URNs, so they travel URL-encoded in the path.
 */
export function createEnrichmentRouter(engine: EnrichmentEngine): Router {
  const router = Router();

  /**
   * POST /api/enrichment/batches
   * Enrich a set of datasets and stage their suggestions
   */
  router.post('/batches',
    validate({ body: enrichBatchBodySchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: EnrichBatchBody = req.body;
      const result = await engine.enrichBatch(body.datasetIds, {
        concurrency: body.concurrency,
        signal: abortOnDisconnect(res),
      });
      res.json(result);
    })
  );

  /**
   * POST /api/enrichment/datasets/:datasetId/enrich
   * Enrich one dataset. Pipeline failures map to their error status.
   */
  router.post('/datasets/:datasetId/enrich',
    validate({ params: datasetIdParamsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const result = await engine.enrichDataset(req.params.datasetId, { signal: abortOnDisconnect(res) });
      if (!result.ok) {
        throw result.error;
      }
      res.json(result.batch);
    })
  );

  /**
   * GET /api/enrichment/datasets/:datasetId/suggestions
   * Staged suggestions of a dataset with their apply outcomes
   */
  router.get('/datasets/:datasetId/suggestions',
    validate({ params: datasetIdParamsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const suggestions = await engine.listSuggestions(req.params.datasetId);
      res.json({ datasetId: req.params.datasetId, suggestions });
    })
  );

  /**
   * POST /api/enrichment/suggestions/apply
   * Apply several suggestions; unknown ids come back in `notFound`
   */
  router.post('/suggestions/apply',
    validate({ body: applySuggestionsBodySchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: ApplySuggestionsBody = req.body;
      const report = await engine.applySuggestions(body.suggestionIds, { override: body.override });
      res.json(report);
    })
  );

  /**
   * GET /api/enrichment/suggestions/:id
   */
  router.get('/suggestions/:id',
    validate({ params: suggestionIdParamsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const view = await engine.getSuggestion(req.params.id);
      throwIfNotFound(view, 'Suggestion', req.params.id);
      res.json(view);
    })
  );

  /**
   * POST /api/enrichment/suggestions/:id/apply
   */
  router.post('/suggestions/:id/apply',
    validate({ params: suggestionIdParamsSchema, body: applyOneBodySchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const body: z.infer<typeof applyOneBodySchema> = req.body;
      const outcome = await engine.applySuggestion(req.params.id, { override: body.override });
      res.json(outcome);
    })
  );

  /**
   * GET /api/enrichment/health
   * Circuit breaker state and cache statistics
   */
  router.get('/health', (_req: Request, res: Response) => {
    const status = engine.getStatus();
    const open = status.breaker.state === CircuitState.OPEN;
    res.status(open ? 503 : 200).json({
      status: open ? 'degraded' : 'ok',
      ...status,
    });
  });

  return router;
}

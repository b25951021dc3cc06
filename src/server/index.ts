/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires together all endpoints.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { NotFoundError, ValidationError } from '@/core/errors';
import type { EntryIngestionService } from '@/core/ingestion/service';
import type { GraphClient } from '@/providers/graph/types';
import { logRequestError } from '@/utils/logger';
import { createGraphRoutes } from './routes';

export interface AppDependencies {
  service: EntryIngestionService;
  graph: GraphClient;
}

export function createApp({ service, graph }: AppDependencies): Hono {
  const app = new Hono();

  // Health check
  app.get('/health', async (c) =>
    (await graph.healthCheck()) ? c.json({ status: 'ok' }) : c.json({ status: 'degraded' }, 503)
  );

  // Mount graph routes (ingestion, browsing, search)
  app.route('/graph', createGraphRoutes(service));

  app.notFound((c) => c.json({ error: 'not_found' }, 404));

  // Internal detail is logged, never returned
  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: 'invalid_request', details: err.details }, 400);
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: 'not_found' }, 404);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logRequestError(c.req.method, c.req.path, err);
    return c.json({ error: 'internal_error' }, 500);
  });

  return app;
}

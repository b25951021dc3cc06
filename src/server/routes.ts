/**
 * Graph Routes
 *
 * - POST   /graph/entries                 Ingest an entry (202, extraction in background)
 * - GET    /graph/entries/:id             Entry with extraction status
 * - GET    /graph/entities                Paginated listing (offset, limit)
 * - GET    /graph/entities/:id            Entity by id
 * - GET    /graph/entities/:id/relations  Relations in either direction
 * - DELETE /graph/entities/:id            Delete entity and its relations
 * - POST   /graph/search/text             Substring search
 * - POST   /graph/search/semantic         Alias of text search (X-Search-Strategy: text-proxy)
 */

import { type Context, Hono } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '@/core/errors';
import type { EntryIngestionService } from '@/core/ingestion/service';
import {
  IngestEntrySchema,
  ListEntitiesQuerySchema,
  parseInput,
  SemanticSearchSchema,
  TextSearchSchema
} from './schemas';

async function parseBody<T>(c: Context, schema: z.ZodType<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Invalid request', ['body: must be valid JSON']);
  }
  return parseInput(schema, body);
}

export function createGraphRoutes(service: EntryIngestionService): Hono {
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────────────────────
  // Entries
  // ─────────────────────────────────────────────────────────────────────────────

  app.post('/entries', async (c) => {
    const body = await parseBody(c, IngestEntrySchema);
    return c.json(await service.ingestEntry(body), 202);
  });

  app.get('/entries/:id', async (c) => c.json(await service.getEntry(c.req.param('id'))));

  // ─────────────────────────────────────────────────────────────────────────────
  // Entities
  // ─────────────────────────────────────────────────────────────────────────────

  app.get('/entities', async (c) => {
    const { offset, limit } = parseInput(ListEntitiesQuerySchema, c.req.query());
    return c.json(await service.listEntities(offset, limit));
  });

  app.get('/entities/:id', async (c) => c.json(await service.getEntity(c.req.param('id'))));

  app.get('/entities/:id/relations', async (c) =>
    c.json(await service.getRelations(c.req.param('id')))
  );

  app.delete('/entities/:id', async (c) => {
    await service.deleteEntity(c.req.param('id'));
    return c.body(null, 204);
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Search
  // ─────────────────────────────────────────────────────────────────────────────

  app.post('/search/text', async (c) => {
    const { query, limit } = await parseBody(c, TextSearchSchema);
    return c.json(await service.textSearch(query, limit));
  });

  app.post('/search/semantic', async (c) => {
    const { query, limit } = await parseBody(c, SemanticSearchSchema);
    const { strategy, results } = await service.semanticSearch(query, limit);
    c.header('X-Search-Strategy', strategy);
    return c.json(results);
  });

  return app;
}

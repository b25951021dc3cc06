/**
 * Request Schemas
 *
 * Zod schemas for request bodies and query strings. Parse failures become
 * ValidationErrors, which the app maps to 400.
 */

import { z } from 'zod';
import { ValidationError } from '@/core/errors';

export const MAX_LIMIT = 100;
export const DEFAULT_LIST_LIMIT = 20;
export const DEFAULT_TEXT_SEARCH_LIMIT = 20;
export const DEFAULT_SEMANTIC_SEARCH_LIMIT = 10;

export const IngestEntrySchema = z.object({
  text: z.string(),
  title: z.string().optional(),
  summary: z.string().optional()
});

export const ListEntitiesQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIST_LIMIT)
});

export function searchSchema(defaultLimit: number) {
  return z.object({
    query: z.string().trim().min(1),
    limit: z.number().int().min(1).max(MAX_LIMIT).default(defaultLimit)
  });
}

export const TextSearchSchema = searchSchema(DEFAULT_TEXT_SEARCH_LIMIT);
export const SemanticSearchSchema = searchSchema(DEFAULT_SEMANTIC_SEARCH_LIMIT);

/**
 * Validate input against a schema, collecting every issue as `path: message`.
 */
export function parseInput<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      'Invalid request',
      result.error.issues.map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}

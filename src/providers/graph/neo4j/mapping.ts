/**
 * Neo4j Record Mapping
 *
 * Translators that convert Neo4j nodes and relationships to domain types.
 * Centralizes all type coercion and null handling. Property bags are
 * validated rather than trusted: a node written by something else fails
 * loudly here instead of leaking malformed values.
 */

import { z } from 'zod';
import { StoreError } from '../types';
import type { Entity, Entry, Relation } from '../types';
import { ENTRY_STATUSES } from '../types';

// ============================================================
// DRIVER SHAPES
// ============================================================

/**
 * Shape of a Neo4j node or relationship as returned by the driver.
 */
export interface Neo4jNode {
  properties: Record<string, unknown>;
}

// ============================================================
// PROPERTY SCHEMAS
// ============================================================

const entityProps = z.object({
  id: z.string(),
  kind: z.string(),
  name: z.string(),
  summary: z.string().nullish(),
  source_entry_ids: z.array(z.string()).nullish(),
  created_at: z.string(),
  updated_at: z.string()
});

const entryProps = entityProps.extend({
  text: z.string(),
  status: z.enum(ENTRY_STATUSES),
  error: z.string().nullish(),
  degraded: z.boolean().nullish()
});

const relationProps = z.object({
  id: z.string(),
  confidence: z.number().nullish(),
  source_entry_ids: z.array(z.string()).nullish()
});

function parseProps<T>(schema: z.ZodType<T>, node: Neo4jNode, what: string): T {
  const result = schema.safeParse(node.properties);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new StoreError(
      `Malformed ${what} node: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
      'QUERY_ERROR'
    );
  }
  return result.data;
}

// ============================================================
// RECORD TRANSLATORS
// ============================================================

/**
 * Convert a Neo4j node to an Entity.
 */
export function recordToEntity(node: Neo4jNode): Entity {
  const props = parseProps(entityProps, node, 'entity');
  return {
    id: props.id,
    kind: props.kind,
    name: props.name,
    summary: props.summary ?? null,
    sourceEntryIds: props.source_entry_ids ?? [],
    created_at: props.created_at,
    updated_at: props.updated_at
  };
}

/**
 * Convert a Neo4j ENTRY node to an Entry.
 */
export function recordToEntry(node: Neo4jNode): Entry {
  const props = parseProps(entryProps, node, 'entry');
  return {
    id: props.id,
    name: props.name,
    summary: props.summary ?? null,
    text: props.text,
    status: props.status,
    error: props.error ?? null,
    degraded: props.degraded ?? false,
    created_at: props.created_at,
    updated_at: props.updated_at
  };
}

/**
 * Convert a Neo4j relationship plus its endpoint ids to a Relation.
 * Endpoints come from the query since relationships only know internal ids.
 */
export function recordToRelation(
  rel: Neo4jNode,
  sourceId: string,
  targetId: string,
  kind: string
): Relation {
  const props = parseProps(relationProps, rel, 'relation');
  return {
    id: props.id,
    sourceId,
    targetId,
    kind,
    confidence: props.confidence ?? null,
    sourceEntryIds: props.source_entry_ids ?? []
  };
}

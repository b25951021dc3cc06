/**
 * Neo4j Query Repository
 *
 * Centralized Cypher queries with intent documentation.
 * Each query explains the semantic reasoning behind the pattern.
 */

import { isValidKind } from '../utils';
import { INDEXES, LABELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * CONSTRAINT QUERIES
 *
 * - id: reference integrity for relations and the HTTP surface
 * - identity_key: `KIND:normalized name`, one node per (kind, name) pair
 */
export const CONSTRAINTS = {
  ENTITY_ID: `CREATE CONSTRAINT entity_id_unique IF NOT EXISTS FOR (e:${LABELS.ENTITY}) REQUIRE e.id IS UNIQUE`,
  ENTITY_IDENTITY: `CREATE CONSTRAINT entity_identity_unique IF NOT EXISTS FOR (e:${LABELS.ENTITY}) REQUIRE e.identity_key IS UNIQUE`
} as const;

/**
 * RANGE INDEX QUERIES
 *
 * created_at backs the stable listing order.
 */
export const RANGE_INDEXES = {
  ENTITY_CREATED_AT: `CREATE INDEX ${INDEXES.ENTITY_CREATED_AT} IF NOT EXISTS FOR (e:${LABELS.ENTITY}) ON (e.created_at)`
} as const;

/**
 * Guard for values interpolated into labels and relationship types.
 */
function assertKind(kind: string): string {
  if (!isValidKind(kind)) {
    throw new Error(`Refusing to interpolate invalid kind: ${kind}`);
  }
  return kind;
}

// ============================================================
// ENTRY QUERIES
// ============================================================

/**
 * Create an entry node.
 * Entries are Entity nodes too, so they show up in listings and can be
 * the source of MENTIONS relations.
 */
export const CREATE_ENTRY = `
CREATE (e:${LABELS.ENTITY}:${LABELS.ENTRY} {
  id: $id,
  identity_key: $identityKey,
  kind: '${LABELS.ENTRY}',
  name: $name,
  summary: $summary,
  text: $text,
  status: 'pending',
  degraded: false,
  source_entry_ids: [$id],
  created_at: $timestamp,
  updated_at: $timestamp
})
RETURN e
`;

export const GET_ENTRY = `
MATCH (e:${LABELS.ENTITY}:${LABELS.ENTRY} {id: $id})
RETURN e
`;

/**
 * Status transition.
 * `degraded` is only touched when the caller supplies it.
 */
export const UPDATE_ENTRY_STATUS = `
MATCH (e:${LABELS.ENTITY}:${LABELS.ENTRY} {id: $id})
SET e.status = $status,
    e.error = $error,
    e.degraded = coalesce($degraded, e.degraded),
    e.updated_at = $timestamp
RETURN e.id AS id
`;

// ============================================================
// ENTITY QUERIES
// ============================================================

export const GET_ENTITY_BY_ID = `
MATCH (e:${LABELS.ENTITY} {id: $id})
RETURN e
`;

/**
 * Paginated listing.
 * Ties on created_at are broken by id so pages never overlap.
 */
export const LIST_ENTITIES = `
MATCH (e:${LABELS.ENTITY})
RETURN e
ORDER BY e.created_at, e.id
SKIP $offset
LIMIT $limit
`;

/**
 * Substring search over name and summary.
 * No relevance ranking: results follow the listing order.
 */
export const SEARCH_ENTITIES = `
MATCH (e:${LABELS.ENTITY})
WHERE toLower(e.name) CONTAINS toLower($query)
   OR toLower(coalesce(e.summary, '')) CONTAINS toLower($query)
RETURN e
ORDER BY e.created_at, e.id
LIMIT $limit
`;

export const DELETE_ENTITY = `
MATCH (e:${LABELS.ENTITY} {id: $id})
DETACH DELETE e
RETURN count(*) AS deleted
`;

/**
 * Read-before-write lookup used by the resolver inside the plan's transaction.
 */
export const FIND_ENTITIES_BY_IDENTITY = `
MATCH (e:${LABELS.ENTITY})
WHERE e.identity_key IN $keys
RETURN e
`;

/**
 * Create entities of one kind.
 *
 * MERGE on identity_key rather than CREATE: a concurrent extraction may
 * have created the same identity after our read. The unique constraint
 * makes MERGE take the lock, and the ON MATCH branch folds our attributes
 * into the winner's node.
 */
export function createEntitiesQuery(kind: string): string {
  const label = assertKind(kind);
  return `
UNWIND $entities AS row
MERGE (e:${LABELS.ENTITY} {identity_key: row.identityKey})
ON CREATE SET e:\`${label}\`,
              e.id = row.id,
              e.kind = row.kind,
              e.name = row.name,
              e.summary = row.summary,
              e.source_entry_ids = row.sourceEntryIds,
              e.created_at = $timestamp,
              e.updated_at = $timestamp
ON MATCH SET e.summary = coalesce(row.summary, e.summary),
             e.source_entry_ids = e.source_entry_ids +
               [x IN row.sourceEntryIds WHERE NOT x IN e.source_entry_ids],
             e.updated_at = $timestamp
RETURN count(e) AS written
`;
}

/**
 * Overwrite merged attributes of existing entities.
 * The resolver has already combined old and new values.
 */
export const MERGE_ENTITIES = `
UNWIND $entities AS row
MATCH (e:${LABELS.ENTITY} {id: row.id})
SET e.name = row.name,
    e.summary = row.summary,
    e.source_entry_ids = row.sourceEntryIds,
    e.updated_at = $timestamp
RETURN count(e) AS written
`;

// ============================================================
// RELATION QUERIES
// ============================================================

/**
 * Create relations of one type.
 *
 * MATCH on both endpoints: a missing endpoint yields no row, which the
 * caller detects through `written` and turns into a failed plan.
 */
export function createRelationsQuery(kind: string): string {
  const type = assertKind(kind);
  return `
UNWIND $relations AS row
MATCH (s:${LABELS.ENTITY} {id: row.sourceId}), (t:${LABELS.ENTITY} {id: row.targetId})
MERGE (s)-[r:\`${type}\`]->(t)
ON CREATE SET r.id = row.id,
              r.kind = row.kind,
              r.confidence = row.confidence,
              r.source_entry_ids = row.sourceEntryIds
ON MATCH SET r.confidence = CASE
               WHEN r.confidence IS NULL THEN row.confidence
               WHEN row.confidence IS NOT NULL AND row.confidence > r.confidence THEN row.confidence
               ELSE r.confidence
             END,
             r.source_entry_ids = r.source_entry_ids +
               [x IN row.sourceEntryIds WHERE NOT x IN r.source_entry_ids]
RETURN count(r) AS written
`;
}

export function mergeRelationsQuery(kind: string): string {
  const type = assertKind(kind);
  return `
UNWIND $relations AS row
MATCH (:${LABELS.ENTITY} {id: row.sourceId})-[r:\`${type}\`]->(:${LABELS.ENTITY} {id: row.targetId})
SET r.confidence = row.confidence,
    r.source_entry_ids = row.sourceEntryIds
RETURN count(r) AS written
`;
}

/**
 * Existing relations for a batch of (source, kind, target) triples.
 */
export const FIND_RELATIONS = `
UNWIND $triples AS t
MATCH (s:${LABELS.ENTITY} {id: t.sourceId})-[r]->(o:${LABELS.ENTITY} {id: t.targetId})
WHERE type(r) = t.kind
RETURN r, s.id AS sourceId, o.id AS targetId, type(r) AS kind
`;

export const GET_RELATIONS_FOR_ENTITY = `
MATCH (e:${LABELS.ENTITY} {id: $id})-[r]-(:${LABELS.ENTITY})
RETURN DISTINCT r, startNode(r).id AS sourceId, endNode(r).id AS targetId, type(r) AS kind
ORDER BY kind, sourceId, targetId
`;

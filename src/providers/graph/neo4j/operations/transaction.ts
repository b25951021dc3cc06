/**
 * Neo4j Transaction Operations
 *
 * Reads and writes that run inside an existing managed transaction.
 * The client's standalone operations reuse the read functions; the
 * write functions are only reachable through a TransactionClient so a
 * mutation plan always lands in one atomic unit.
 */

import type { ManagedTransaction } from 'neo4j-driver';
import type {
  Entity,
  EntityWrite,
  EntryStatusUpdate,
  Relation,
  RelationTriple,
  RelationWrite,
  TransactionClient
} from '../../types';
import { StoreError } from '../../types';
import { now, relationKey } from '../../utils';
import { recordToEntity, recordToRelation } from '../mapping';
import {
  createEntitiesQuery,
  createRelationsQuery,
  FIND_ENTITIES_BY_IDENTITY,
  FIND_RELATIONS,
  MERGE_ENTITIES,
  mergeRelationsQuery,
  UPDATE_ENTRY_STATUS
} from '../queries';
import { readCount, readString } from './records';

// ============================================================
// READS
// ============================================================

export async function findEntitiesByIdentity(
  tx: ManagedTransaction,
  identityKeys: string[]
): Promise<Map<string, Entity>> {
  const found = new Map<string, Entity>();
  if (identityKeys.length === 0) return found;

  const result = await tx.run(FIND_ENTITIES_BY_IDENTITY, { keys: identityKeys });
  for (const record of result.records) {
    const node = record.get('e');
    const key: unknown = node.properties['identity_key'];
    if (typeof key === 'string') {
      found.set(key, recordToEntity(node));
    }
  }
  return found;
}

export async function findRelations(
  tx: ManagedTransaction,
  triples: RelationTriple[]
): Promise<Map<string, Relation>> {
  const found = new Map<string, Relation>();
  if (triples.length === 0) return found;

  const result = await tx.run(FIND_RELATIONS, { triples });
  for (const record of result.records) {
    const relation = recordToRelation(
      record.get('r'),
      readString(record, 'sourceId'),
      readString(record, 'targetId'),
      readString(record, 'kind')
    );
    found.set(relationKey(relation.sourceId, relation.kind, relation.targetId), relation);
  }
  return found;
}

// ============================================================
// WRITES
// ============================================================

/**
 * Group rows by kind: labels and relationship types are part of the
 * query text, so each kind needs its own statement.
 */
function groupByKind<T extends { kind: string }>(rows: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const group = groups.get(row.kind);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.kind, [row]);
    }
  }
  return groups;
}

function assertWritten(written: number, expected: number, operation: string): void {
  if (written !== expected) {
    throw new StoreError(
      `${operation}: wrote ${written} of ${expected} rows (missing endpoint or node)`,
      'QUERY_ERROR'
    );
  }
}

async function createEntities(tx: ManagedTransaction, entities: EntityWrite[]): Promise<void> {
  const timestamp = now();
  for (const [kind, rows] of groupByKind(entities)) {
    const result = await tx.run(createEntitiesQuery(kind), { entities: rows, timestamp });
    assertWritten(readCount(result.records[0], 'written'), rows.length, 'createEntities');
  }
}

async function mergeEntities(tx: ManagedTransaction, entities: EntityWrite[]): Promise<void> {
  if (entities.length === 0) return;
  const result = await tx.run(MERGE_ENTITIES, { entities, timestamp: now() });
  assertWritten(readCount(result.records[0], 'written'), entities.length, 'mergeEntities');
}

async function createRelations(
  tx: ManagedTransaction,
  relations: RelationWrite[]
): Promise<void> {
  for (const [kind, rows] of groupByKind(relations)) {
    const result = await tx.run(createRelationsQuery(kind), { relations: rows });
    assertWritten(readCount(result.records[0], 'written'), rows.length, 'createRelations');
  }
}

async function mergeRelations(tx: ManagedTransaction, relations: RelationWrite[]): Promise<void> {
  for (const [kind, rows] of groupByKind(relations)) {
    const result = await tx.run(mergeRelationsQuery(kind), { relations: rows });
    assertWritten(readCount(result.records[0], 'written'), rows.length, 'mergeRelations');
  }
}

export async function updateEntryStatus(
  tx: ManagedTransaction,
  id: string,
  update: EntryStatusUpdate
): Promise<void> {
  const result = await tx.run(UPDATE_ENTRY_STATUS, {
    id,
    status: update.status,
    error: update.error ?? null,
    degraded: update.degraded ?? null,
    timestamp: now()
  });
  if (result.records.length === 0) {
    throw new StoreError(`Entry not found: ${id}`, 'QUERY_ERROR');
  }
}

// ============================================================
// TRANSACTION CLIENT IMPLEMENTATION
// ============================================================

/**
 * Creates a TransactionClient that executes operations within
 * the provided Neo4j managed transaction.
 */
export function createTransactionClient(tx: ManagedTransaction): TransactionClient {
  return {
    findEntitiesByIdentity: (keys) => findEntitiesByIdentity(tx, keys),
    findRelations: (triples) => findRelations(tx, triples),
    createEntities: (entities) => createEntities(tx, entities),
    mergeEntities: (entities) => mergeEntities(tx, entities),
    createRelations: (relations) => createRelations(tx, relations),
    mergeRelations: (relations) => mergeRelations(tx, relations),
    updateEntryStatus: (id, update) => updateEntryStatus(tx, id, update)
  };
}

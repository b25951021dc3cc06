/**
 * Neo4j Node Operations
 *
 * Entity lookup, listing and deletion.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import neo4j from 'neo4j-driver';
import type { Entity, Page } from '../../types';
import { type CommandContext, runCommand } from '../errors';
import { recordToEntity } from '../mapping';
import { DELETE_ENTITY, GET_ENTITY_BY_ID, LIST_ENTITIES } from '../queries';
import { readCount } from './records';

export async function getEntityById(ctx: CommandContext, id: string): Promise<Entity | null> {
  return runCommand(
    ctx,
    'read',
    async (tx) => {
      const result = await tx.run(GET_ENTITY_BY_ID, { id });
      const record = result.records[0];
      return record ? recordToEntity(record.get('e')) : null;
    },
    'getEntityById'
  );
}

/**
 * List entities in creation order.
 * SKIP/LIMIT need integer parameters; plain JS numbers travel as floats.
 */
export async function listEntities(ctx: CommandContext, page: Page): Promise<Entity[]> {
  return runCommand(
    ctx,
    'read',
    async (tx) => {
      const result = await tx.run(LIST_ENTITIES, {
        offset: neo4j.int(page.offset),
        limit: neo4j.int(page.limit)
      });
      return result.records.map((r) => recordToEntity(r.get('e')));
    },
    'listEntities'
  );
}

/**
 * Delete an entity with all of its relations.
 */
export async function deleteEntity(ctx: CommandContext, id: string): Promise<boolean> {
  return runCommand(
    ctx,
    'write',
    async (tx) => {
      const result = await tx.run(DELETE_ENTITY, { id });
      return readCount(result.records[0], 'deleted') > 0;
    },
    'deleteEntity'
  );
}

/**
 * Neo4j Search Operations
 *
 * Substring search over entity names and summaries.
 */

import neo4j from 'neo4j-driver';
import type { Entity } from '../../types';
import { type CommandContext, runCommand } from '../errors';
import { recordToEntity } from '../mapping';
import { SEARCH_ENTITIES } from '../queries';

/**
 * Case-insensitive, unanchored match on name or summary.
 * The query is a parameter, never part of the Cypher text.
 */
export async function searchEntities(
  ctx: CommandContext,
  query: string,
  limit: number
): Promise<Entity[]> {
  return runCommand(
    ctx,
    'read',
    async (tx) => {
      const result = await tx.run(SEARCH_ENTITIES, { query, limit: neo4j.int(limit) });
      return result.records.map((r) => recordToEntity(r.get('e')));
    },
    'searchEntities'
  );
}

/**
 * Neo4j Edge Operations
 *
 * Relation reads outside a mutation plan.
 */

import type { Relation } from '../../types';
import { type CommandContext, runCommand } from '../errors';
import { recordToRelation } from '../mapping';
import { GET_RELATIONS_FOR_ENTITY } from '../queries';
import { readString } from './records';

/**
 * Relations touching an entity in either direction.
 */
export async function getRelationsForEntity(
  ctx: CommandContext,
  id: string
): Promise<Relation[]> {
  return runCommand(
    ctx,
    'read',
    async (tx) => {
      const result = await tx.run(GET_RELATIONS_FOR_ENTITY, { id });
      return result.records.map((record) =>
        recordToRelation(
          record.get('r'),
          readString(record, 'sourceId'),
          readString(record, 'targetId'),
          readString(record, 'kind')
        )
      );
    },
    'getRelationsForEntity'
  );
}

/**
 * Neo4j Entry Operations
 *
 * Entry creation, lookup and status transitions.
 * Uses runCommand for session lifecycle and query repository for Cypher.
 */

import type { CreateEntryInput, Entry, EntryStatusUpdate } from '../../types';
import { StoreError } from '../../types';
import { entryIdentityKey, generateId, now } from '../../utils';
import { type CommandContext, runCommand } from '../errors';
import { recordToEntry } from '../mapping';
import { CREATE_ENTRY, GET_ENTRY } from '../queries';
import { updateEntryStatus as updateEntryStatusInTx } from './transaction';

/**
 * Persist a new entry in `pending` status.
 */
export async function createEntry(ctx: CommandContext, input: CreateEntryInput): Promise<Entry> {
  const id = generateId();

  return runCommand(
    ctx,
    'write',
    async (tx) => {
      const result = await tx.run(CREATE_ENTRY, {
        id,
        identityKey: entryIdentityKey(id),
        name: input.name,
        summary: input.summary,
        text: input.text,
        timestamp: now()
      });
      const record = result.records[0];
      if (!record) {
        throw new StoreError('Failed to create entry', 'QUERY_ERROR');
      }
      return recordToEntry(record.get('e'));
    },
    'createEntry'
  );
}

export async function getEntry(ctx: CommandContext, id: string): Promise<Entry | null> {
  return runCommand(
    ctx,
    'read',
    async (tx) => {
      const result = await tx.run(GET_ENTRY, { id });
      const record = result.records[0];
      return record ? recordToEntry(record.get('e')) : null;
    },
    'getEntry'
  );
}

/**
 * Standalone status transition, used outside a mutation plan
 * (`running`, and `failed` after a rolled-back plan).
 */
export async function updateEntryStatus(
  ctx: CommandContext,
  id: string,
  update: EntryStatusUpdate
): Promise<void> {
  return runCommand(
    ctx,
    'write',
    (tx) => updateEntryStatusInTx(tx, id, update),
    'updateEntryStatus'
  );
}

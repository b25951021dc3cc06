/**
 * Neo4j Schema Management
 *
 * Handles database schema initialization: uniqueness constraints and the
 * range index behind listing order. Idempotent, safe to run on every start.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS, RANGE_INDEXES } from './queries';

// ============================================================
// SCHEMA INITIALIZATION
// ============================================================

/**
 * Initialize all database schema elements.
 *
 * Constraints go first: they create implicit indexes the range index
 * does not need to duplicate.
 */
export async function initializeSchema(session: Session): Promise<void> {
  await runSchemaOperation(session, CONSTRAINTS.ENTITY_ID);
  await runSchemaOperation(session, CONSTRAINTS.ENTITY_IDENTITY);
  await runSchemaOperation(session, RANGE_INDEXES.ENTITY_CREATED_AT);
}

/**
 * Run a single schema operation.
 *
 * Several instances starting together race to create the same element;
 * the losers get "already exists", which means the schema is in place.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}

/**
 * Neo4j Graph Provider Module
 *
 * Modular implementation of the GraphClient interface for Neo4j.
 */

export type { Neo4jConfig } from './client';
// Client (public API)
export { Neo4jGraphClient } from './client';

// Foundation exports for internal use
export { INDEXES, LABELS, RELS, RETRY } from './constants';
export type { CommandContext, CommandMode } from './errors';
export {
  classifyNeo4jError,
  isSchemaAlreadyExistsError,
  runCommand,
  toStoreError,
  withRetry
} from './errors';
export type { Neo4jNode } from './mapping';
export { recordToEntity, recordToEntry, recordToRelation } from './mapping';

// Schema management
export { initializeSchema } from './schema';

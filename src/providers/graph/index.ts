/**
 * Graph Provider Module
 *
 * Exports the GraphClient interface and Neo4j implementation.
 */

// Factory
export { createGraphClient } from './factory';

// Neo4j implementation
export type { Neo4jConfig } from './neo4j';
export { Neo4jGraphClient } from './neo4j';

// Types
export type {
  CreateEntryInput,
  Entity,
  EntityKind,
  EntityWrite,
  Entry,
  EntryStatus,
  EntryStatusUpdate,
  GraphClient,
  GraphReader,
  GraphWriter,
  Page,
  Relation,
  RelationTriple,
  RelationWrite,
  StoreErrorType,
  TransactionClient
} from './types';
export { ENTRY_KIND, ENTRY_STATUSES, KNOWN_ENTITY_KINDS, StoreError } from './types';

// Utilities
export {
  entityIdFor,
  entryIdentityKey,
  generateId,
  identityKey,
  isValidKind,
  normalizeKind,
  normalizeName,
  now,
  relationIdFor,
  relationKey
} from './utils';

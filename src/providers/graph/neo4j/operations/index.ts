/**
 * Neo4j Operations Module
 *
 * Re-exports all operation functions for clean imports.
 */

// Edge operations
export { getRelationsForEntity } from './edges';

// Entry operations
export { createEntry, getEntry, updateEntryStatus } from './entries';

// Node operations
export { deleteEntity, getEntityById, listEntities } from './nodes';

// Search operations
export { searchEntities } from './search';

// Transaction operations
export { createTransactionClient } from './transaction';

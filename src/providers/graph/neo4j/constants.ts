/**
 * Neo4j Schema Registry
 *
 * Single source of truth for all database schema elements.
 * Using constants prevents typos and enables IDE autocomplete.
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Node labels in the knowledge graph.
 *
 * Every node carries the base `Entity` label plus one label per kind
 * (`PERSON`, `LOCATION`, ...). Entries are `Entity:ENTRY` nodes.
 */
export const LABELS = {
  ENTITY: 'Entity',
  ENTRY: 'ENTRY'
} as const;

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * Relationship types with fixed meaning.
 *
 * - MENTIONS: Entry -> Entity (the entry names the entity)
 *
 * Every other relationship type comes from extraction (MET_AT, WORKS_AT, ...)
 * and is stored under its own type with the same property set.
 */
export const RELS = {
  MENTIONS: 'MENTIONS'
} as const;

// ============================================================
// INDEX NAMES
// ============================================================

export const INDEXES = {
  ENTITY_CREATED_AT: 'entity_created_at'
} as const;

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/**
 * Retry settings for transient error handling.
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100
} as const;

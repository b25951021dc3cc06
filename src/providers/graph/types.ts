/**
 * Graph Client Types
 *
 * Defines the contract and data types for graph store providers.
 * This is the persistence layer that the extraction pipeline writes into
 * and the HTTP surface reads from.
 */

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * Standard error types that any graph implementation must map to.
 * Lets the pipeline handle store failures the same way regardless
 * of the underlying database.
 */
export type StoreErrorType =
  | 'UNAVAILABLE' // Failed to reach the database
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'TIMEOUT' // Store-level timeout elapsed
  | 'TRANSIENT' // Deadlock or other temporary failure (retry possible)
  | 'QUERY_ERROR'; // Invalid query or execution error

/**
 * Standardized error class for graph operations.
 * All graph client implementations should throw this error type.
 */
export class StoreError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly type: StoreErrorType,
    cause?: Error
  ) {
    super(message);
    this.name = 'StoreError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'TRANSIENT';
  }
}

// ============================================================
// NODE TYPES
// ============================================================

/** Kind given to Entry nodes. */
export const ENTRY_KIND = 'ENTRY';

/**
 * Kinds the extraction prompt offers. The kind set stays open:
 * any upper snake_case kind a provider emits is accepted.
 */
export const KNOWN_ENTITY_KINDS = [
  'PERSON',
  'LOCATION',
  'ORGANIZATION',
  'OBJECT',
  'EVENT',
  'CONCEPT'
] as const;

export type EntityKind = string;

/**
 * Entity: a node in the graph.
 *
 * Identity is the pair (kind, normalized name), persisted as `identity_key`.
 * `sourceEntryIds` are weak back-references to the entries that mentioned it.
 */
export interface Entity {
  id: string; // UUID v5 of the identity key (v7 for entries)
  kind: EntityKind; // "PERSON", "LOCATION", "ENTRY", ...
  name: string; // Display name: "Paris"
  summary: string | null;
  sourceEntryIds: string[];
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
}

export const ENTRY_STATUSES = ['pending', 'running', 'succeeded', 'failed'] as const;
export type EntryStatus = (typeof ENTRY_STATUSES)[number];

/**
 * Entry: a raw user submission, stored as an ENTRY-kind Entity node.
 */
export interface Entry {
  id: string; // UUID v7
  name: string;
  summary: string | null;
  text: string;
  status: EntryStatus;
  error: string | null;
  degraded: boolean;
  created_at: string;
  updated_at: string;
}

// ============================================================
// EDGE TYPES
// ============================================================

/**
 * Relation: a directed typed edge between two Entities.
 * At most one relation exists per (sourceId, targetId, kind).
 */
export interface Relation {
  id: string; // UUID v5 of "source|KIND|target"
  sourceId: string;
  targetId: string;
  kind: string; // Upper snake_case: "MENTIONS", "MET_AT"
  confidence: number | null;
  sourceEntryIds: string[];
}

/** Lookup key for an existing relation. */
export interface RelationTriple {
  sourceId: string;
  targetId: string;
  kind: string;
}

// ============================================================
// INPUT TYPES
// ============================================================

export interface CreateEntryInput {
  text: string;
  name: string;
  summary: string | null;
}

export interface EntryStatusUpdate {
  status: EntryStatus;
  error?: string | null;
  degraded?: boolean;
}

/**
 * Entity write payload. Creates and merges share the shape: a merge
 * overwrites with the already-merged attribute values.
 */
export interface EntityWrite {
  id: string;
  kind: string;
  name: string;
  identityKey: string;
  summary: string | null;
  sourceEntryIds: string[];
}

export interface RelationWrite {
  id: string;
  sourceId: string;
  targetId: string;
  kind: string;
  confidence: number | null;
  sourceEntryIds: string[];
}

export interface Page {
  offset: number;
  limit: number;
}

// ============================================================
// TRANSACTION CLIENT
// ============================================================

/**
 * Reads available inside an atomic unit.
 * The resolver runs its read-before-write checks through these.
 */
export interface GraphReader {
  /** Existing entities keyed by identity key. Missing keys are absent from the map. */
  findEntitiesByIdentity(identityKeys: string[]): Promise<Map<string, Entity>>;

  /** Existing relations keyed by `sourceId|kind|targetId`. */
  findRelations(triples: RelationTriple[]): Promise<Map<string, Relation>>;
}

/**
 * Writes available inside an atomic unit.
 */
export interface GraphWriter {
  createEntities(entities: EntityWrite[]): Promise<void>;
  mergeEntities(entities: EntityWrite[]): Promise<void>;
  createRelations(relations: RelationWrite[]): Promise<void>;
  mergeRelations(relations: RelationWrite[]): Promise<void>;
  updateEntryStatus(id: string, update: EntryStatusUpdate): Promise<void>;
}

/**
 * Client scoped to a single transaction.
 * Everything done through it commits or rolls back together.
 */
export interface TransactionClient extends GraphReader, GraphWriter {}

// ============================================================
// GRAPH CLIENT INTERFACE
// ============================================================

/**
 * GraphClient: the contract for graph store providers.
 */
export interface GraphClient {
  // --- Connection Management ---

  /**
   * Establish connection to the store.
   * Fails fast if the store is unreachable.
   */
  connect(): Promise<void>;

  /** Close connection and release resources. */
  disconnect(): Promise<void>;

  /** Check whether the store is reachable. */
  healthCheck(): Promise<boolean>;

  /**
   * Create constraints and indexes. Idempotent.
   */
  initializeSchema(): Promise<void>;

  // --- Entries ---

  createEntry(input: CreateEntryInput): Promise<Entry>;
  getEntry(id: string): Promise<Entry | null>;
  updateEntryStatus(id: string, update: EntryStatusUpdate): Promise<void>;

  // --- Entities ---

  getEntityById(id: string): Promise<Entity | null>;

  /** Stable ordering: created_at, then id. */
  listEntities(page: Page): Promise<Entity[]>;

  /**
   * Case-insensitive, unanchored substring match over name and summary.
   * Results carry no relevance ranking; ordering matches `listEntities`.
   */
  searchEntities(query: string, limit: number): Promise<Entity[]>;

  /** Delete an entity and its relations. Returns false if it did not exist. */
  deleteEntity(id: string): Promise<boolean>;

  // --- Relations ---

  /** Relations where the entity is source or target. */
  getRelationsForEntity(id: string): Promise<Relation[]>;

  // --- Transactions ---

  /**
   * Run `fn` as one atomic unit. A thrown error rolls back every write
   * made through the transaction client.
   */
  executeTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T>;
}

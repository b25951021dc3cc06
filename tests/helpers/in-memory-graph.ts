/**
 * In-Memory Graph Client
 *
 * A GraphClient that keeps the graph in maps. Transactions run one at a
 * time on a copy; the records they touched are copied back only when the
 * callback resolves, so a failing plan leaves nothing behind. Mirrors the Neo4j client's write
 * semantics: identity-keyed entity creates, relation creates that need
 * both endpoints, merges that need the target to exist.
 */

import type {
  CreateEntryInput,
  Entity,
  EntityWrite,
  Entry,
  EntryStatusUpdate,
  GraphClient,
  Page,
  Relation,
  RelationWrite,
  TransactionClient
} from '@/providers/graph/types';
import { ENTRY_KIND, StoreError } from '@/providers/graph/types';
import { entryIdentityKey, generateId, now, relationKey } from '@/providers/graph/utils';

interface EntryState {
  text: string;
  status: Entry['status'];
  error: string | null;
  degraded: boolean;
}

interface NodeRecord {
  entity: Entity;
  identityKey: string;
  /** Insertion order, for stable listing */
  seq: number;
  entry: EntryState | null;
}

interface GraphState {
  nodes: Map<string, NodeRecord>;
  relations: Map<string, Relation>;
}

interface Draft {
  state: GraphState;
  touchedNodes: Set<string>;
  touchedRelations: Set<string>;
}

function cloneState(state: GraphState): GraphState {
  return structuredClone(state);
}

function maxConfidence(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function unionIds(existing: string[], added: string[]): string[] {
  return [...new Set([...existing, ...added])];
}

export class InMemoryGraphClient implements GraphClient {
  private state: GraphState = { nodes: new Map(), relations: new Map() };
  private seq = 0;
  private lock: Promise<void> = Promise.resolve();
  private healthy = true;
  private writeCount = 0;
  private failAtWrite: number | null = null;
  private writeHook: ((operation: string) => void) | null = null;

  /** Transactions started, committed or not */
  transactions = 0;

  // ═══════════════════════════════════════════════════════════════════════════
  // Test Controls
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Make the nth non-empty transactional write from now on throw
   * StoreError(UNAVAILABLE). Counting restarts with every call.
   */
  failOnWrite(n: number): void {
    this.writeCount = 0;
    this.failAtWrite = n;
  }

  /** Called with the operation name on every non-empty transactional write. */
  onWrite(hook: (operation: string) => void): void {
    this.writeHook = hook;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  /** Every relation, in insertion order. */
  allRelations(): Relation[] {
    return [...this.state.relations.values()].map((relation) => ({ ...relation }));
  }

  /** Every non-entry entity, in insertion order. */
  extractedEntities(): Entity[] {
    return this.sortedNodes()
      .filter((node) => node.entry === null)
      .map((node) => ({ ...node.entity }));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Connection
  // ═══════════════════════════════════════════════════════════════════════════

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async initializeSchema(): Promise<void> {}

  // ═══════════════════════════════════════════════════════════════════════════
  // Entries
  // ═══════════════════════════════════════════════════════════════════════════

  async createEntry(input: CreateEntryInput): Promise<Entry> {
    const id = generateId();
    const timestamp = now();
    this.state.nodes.set(id, {
      entity: {
        id,
        kind: ENTRY_KIND,
        name: input.name,
        summary: input.summary,
        sourceEntryIds: [id],
        created_at: timestamp,
        updated_at: timestamp
      },
      identityKey: entryIdentityKey(id),
      seq: this.seq++,
      entry: { text: input.text, status: 'pending', error: null, degraded: false }
    });
    const entry = await this.getEntry(id);
    if (!entry) throw new Error('unreachable');
    return entry;
  }

  async getEntry(id: string): Promise<Entry | null> {
    const node = this.state.nodes.get(id);
    if (!node?.entry) return null;
    return {
      id,
      name: node.entity.name,
      summary: node.entity.summary,
      text: node.entry.text,
      status: node.entry.status,
      error: node.entry.error,
      degraded: node.entry.degraded,
      created_at: node.entity.created_at,
      updated_at: node.entity.updated_at
    };
  }

  async updateEntryStatus(id: string, update: EntryStatusUpdate): Promise<void> {
    this.applyEntryStatus(this.state, id, update);
  }

  private applyEntryStatus(state: GraphState, id: string, update: EntryStatusUpdate): void {
    const node = state.nodes.get(id);
    if (!node?.entry) throw new StoreError(`Entry not found: ${id}`, 'QUERY_ERROR');
    node.entry.status = update.status;
    node.entry.error = update.error ?? null;
    if (update.degraded !== undefined) node.entry.degraded = update.degraded;
    node.entity.updated_at = now();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Entities & Relations
  // ═══════════════════════════════════════════════════════════════════════════

  private sortedNodes(): NodeRecord[] {
    return [...this.state.nodes.values()].sort((a, b) => a.seq - b.seq);
  }

  async getEntityById(id: string): Promise<Entity | null> {
    const node = this.state.nodes.get(id);
    return node ? { ...node.entity } : null;
  }

  async listEntities(page: Page): Promise<Entity[]> {
    return this.sortedNodes()
      .slice(page.offset, page.offset + page.limit)
      .map((node) => ({ ...node.entity }));
  }

  async searchEntities(query: string, limit: number): Promise<Entity[]> {
    const needle = query.toLowerCase();
    return this.sortedNodes()
      .map((node) => ({ ...node.entity }))
      .filter(
        (entity) =>
          entity.name.toLowerCase().includes(needle) ||
          (entity.summary ?? '').toLowerCase().includes(needle)
      )
      .slice(0, limit);
  }

  async deleteEntity(id: string): Promise<boolean> {
    if (!this.state.nodes.delete(id)) return false;
    for (const [key, relation] of this.state.relations) {
      if (relation.sourceId === id || relation.targetId === id) {
        this.state.relations.delete(key);
      }
    }
    return true;
  }

  async getRelationsForEntity(id: string): Promise<Relation[]> {
    return [...this.state.relations.values()]
      .filter((relation) => relation.sourceId === id || relation.targetId === id)
      .map((relation) => ({ ...relation }))
      .sort(
        (a, b) =>
          a.kind.localeCompare(b.kind) ||
          a.sourceId.localeCompare(b.sourceId) ||
          a.targetId.localeCompare(b.targetId)
      );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Transactions
  // ═══════════════════════════════════════════════════════════════════════════

  async executeTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T> {
    const previous = this.lock;
    let release = () => {};
    this.lock = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    await previous;

    try {
      this.transactions++;
      const draft: Draft = {
        state: cloneState(this.state),
        touchedNodes: new Set(),
        touchedRelations: new Set()
      };
      const result = await fn(this.transactionClient(draft));
      this.commit(draft);
      return result;
    } finally {
      release();
    }
  }

  private commit(draft: Draft): void {
    for (const id of draft.touchedNodes) {
      const node = draft.state.nodes.get(id);
      if (node) this.state.nodes.set(id, node);
    }
    for (const key of draft.touchedRelations) {
      const relation = draft.state.relations.get(key);
      if (relation) this.state.relations.set(key, relation);
    }
  }

  private countWrite(operation: string): void {
    this.writeHook?.(operation);
    this.writeCount++;
    if (this.failAtWrite !== null && this.writeCount === this.failAtWrite) {
      this.failAtWrite = null;
      throw new StoreError(`${operation} rejected by store`, 'UNAVAILABLE');
    }
  }

  private transactionClient(draft: Draft): TransactionClient {
    const { state, touchedNodes, touchedRelations } = draft;

    const createEntities = async (entities: EntityWrite[]) => {
      if (entities.length === 0) return;
      this.countWrite('createEntities');
      const timestamp = now();
      for (const write of entities) {
        const existing = [...state.nodes.values()].find((n) => n.identityKey === write.identityKey);
        if (existing) {
          touchedNodes.add(existing.entity.id);
          existing.entity.summary = write.summary ?? existing.entity.summary;
          existing.entity.sourceEntryIds = unionIds(existing.entity.sourceEntryIds, write.sourceEntryIds);
          existing.entity.updated_at = timestamp;
          continue;
        }
        touchedNodes.add(write.id);
        state.nodes.set(write.id, {
          entity: {
            id: write.id,
            kind: write.kind,
            name: write.name,
            summary: write.summary,
            sourceEntryIds: [...write.sourceEntryIds],
            created_at: timestamp,
            updated_at: timestamp
          },
          identityKey: write.identityKey,
          seq: this.seq++,
          entry: null
        });
      }
    };

    const mergeEntities = async (entities: EntityWrite[]) => {
      if (entities.length === 0) return;
      this.countWrite('mergeEntities');
      const timestamp = now();
      for (const write of entities) {
        const node = state.nodes.get(write.id);
        if (!node) throw new StoreError(`mergeEntities: missing node ${write.id}`, 'QUERY_ERROR');
        touchedNodes.add(write.id);
        node.entity.name = write.name;
        node.entity.summary = write.summary;
        node.entity.sourceEntryIds = [...write.sourceEntryIds];
        node.entity.updated_at = timestamp;
      }
    };

    const createRelations = async (relations: RelationWrite[]) => {
      if (relations.length === 0) return;
      this.countWrite('createRelations');
      for (const write of relations) {
        if (!state.nodes.has(write.sourceId) || !state.nodes.has(write.targetId)) {
          throw new StoreError('createRelations: missing endpoint or node', 'QUERY_ERROR');
        }
        const key = relationKey(write.sourceId, write.kind, write.targetId);
        touchedRelations.add(key);
        const existing = state.relations.get(key);
        if (existing) {
          existing.confidence = maxConfidence(existing.confidence, write.confidence);
          existing.sourceEntryIds = unionIds(existing.sourceEntryIds, write.sourceEntryIds);
          continue;
        }
        state.relations.set(key, { ...write, sourceEntryIds: [...write.sourceEntryIds] });
      }
    };

    const mergeRelations = async (relations: RelationWrite[]) => {
      if (relations.length === 0) return;
      this.countWrite('mergeRelations');
      for (const write of relations) {
        const key = relationKey(write.sourceId, write.kind, write.targetId);
        const existing = state.relations.get(key);
        if (!existing) throw new StoreError('mergeRelations: missing relation', 'QUERY_ERROR');
        touchedRelations.add(key);
        existing.confidence = write.confidence;
        existing.sourceEntryIds = [...write.sourceEntryIds];
      }
    };

    return {
      findEntitiesByIdentity: async (keys) => {
        const found = new Map<string, Entity>();
        for (const node of state.nodes.values()) {
          if (keys.includes(node.identityKey)) found.set(node.identityKey, { ...node.entity });
        }
        return found;
      },
      findRelations: async (triples) => {
        const found = new Map<string, Relation>();
        for (const triple of triples) {
          const key = relationKey(triple.sourceId, triple.kind, triple.targetId);
          const relation = state.relations.get(key);
          if (relation) found.set(key, { ...relation });
        }
        return found;
      },
      createEntities,
      mergeEntities,
      createRelations,
      mergeRelations,
      updateEntryStatus: async (id, update) => {
        this.countWrite('updateEntryStatus');
        this.applyEntryStatus(state, id, update);
        touchedNodes.add(id);
      }
    };
  }
}

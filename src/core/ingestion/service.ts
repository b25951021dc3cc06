/**
 * Entry Ingestion Service
 *
 * The use-case layer behind the HTTP surface. Ingestion persists the entry
 * and hands it to the dispatcher without waiting; the outcome of extraction
 * is only visible later on the entry's status.
 */

import type { Entity, Entry, GraphClient, Relation } from '@/providers/graph/types';
import { logEntryAccepted, logWarning } from '@/utils/logger';
import { NotFoundError, ValidationError } from '../errors';
import type { ExtractionDispatcher } from './dispatcher';

/** Display name of an entry submitted without a title */
export const DEFAULT_ENTRY_NAME = 'Memory Entry';

export const QUEUE_FULL_DETAIL = 'QUEUE_FULL: extraction queue is full';

export const SHUTDOWN_DETAIL = 'CANCELLED: shut down before extraction started';

export interface IngestEntryInput {
  text: string;
  title?: string;
  summary?: string;
}

export interface IngestEntryResult {
  id: string;
  status: 'pending';
}

/**
 * Semantic search is served by substring search until an embedding index
 * exists; the strategy travels with the results so callers can tell.
 */
export interface SemanticSearchResult {
  strategy: 'text-proxy';
  results: Entity[];
}

function optionalText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class EntryIngestionService {
  constructor(
    private readonly graph: GraphClient,
    private readonly dispatcher: ExtractionDispatcher
  ) {}

  // ═══════════════════════════════════════════════════════════════════════════
  // Ingestion
  // ═══════════════════════════════════════════════════════════════════════════

  async ingestEntry(input: IngestEntryInput): Promise<IngestEntryResult> {
    if (input.text.trim().length === 0) {
      throw new ValidationError('Invalid entry', ['text: must not be empty']);
    }

    const entry = await this.graph.createEntry({
      text: input.text,
      name: optionalText(input.title) ?? DEFAULT_ENTRY_NAME,
      summary: optionalText(input.summary)
    });
    logEntryAccepted(entry.id, entry.text);

    if (!this.dispatcher.enqueue(entry.id)) {
      await this.graph.updateEntryStatus(entry.id, { status: 'failed', error: QUEUE_FULL_DETAIL });
    }

    return { id: entry.id, status: 'pending' };
  }

  /**
   * Stop the dispatcher and mark every entry that never started as failed.
   * Returns their ids.
   */
  async shutdown(): Promise<string[]> {
    const dropped = await this.dispatcher.shutdown();
    for (const id of dropped) {
      try {
        await this.graph.updateEntryStatus(id, { status: 'failed', error: SHUTDOWN_DETAIL });
      } catch (error) {
        logWarning(`Could not record cancellation on entry ${id}:`, error);
      }
    }
    return dropped;
  }

  async getEntry(id: string): Promise<Entry> {
    const entry = await this.graph.getEntry(id);
    if (!entry) throw new NotFoundError('entry', id);
    return entry;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Entities
  // ═══════════════════════════════════════════════════════════════════════════

  async getEntity(id: string): Promise<Entity> {
    const entity = await this.graph.getEntityById(id);
    if (!entity) throw new NotFoundError('entity', id);
    return entity;
  }

  /** Stable creation order; pages never overlap. */
  async listEntities(offset: number, limit: number): Promise<Entity[]> {
    return this.graph.listEntities({ offset, limit });
  }

  async getRelations(entityId: string): Promise<Relation[]> {
    await this.getEntity(entityId);
    return this.graph.getRelationsForEntity(entityId);
  }

  async deleteEntity(id: string): Promise<void> {
    const deleted = await this.graph.deleteEntity(id);
    if (!deleted) throw new NotFoundError('entity', id);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Search
  // ═══════════════════════════════════════════════════════════════════════════

  /** Case-insensitive, unanchored substring match on name and summary. */
  async textSearch(query: string, limit: number): Promise<Entity[]> {
    return this.graph.searchEntities(query, limit);
  }

  async semanticSearch(query: string, limit: number): Promise<SemanticSearchResult> {
    return { strategy: 'text-proxy', results: await this.textSearch(query, limit) };
  }
}

/**
 * Entity Resolver
 *
 * Reconciles an extraction result with the current graph and produces a
 * mutation plan. Runs inside the same transaction that applies the plan,
 * so the reads it bases its create/merge decisions on cannot go stale.
 *
 * Identity rules:
 * - Entities match on `KIND:normalized name`
 * - Relations match on (source id, kind, target id)
 * - Ids derive from those keys, so the same input against the same graph
 *   always yields the same plan
 */

import type {
  Entity,
  EntityWrite,
  GraphReader,
  GraphWriter,
  Relation,
  RelationWrite
} from '@/providers/graph/types';
import { entityIdFor, entryIdentityKey, relationIdFor, relationKey } from '@/providers/graph/utils';
import { ExtractionError } from '../extraction/errors';
import { maxConfidence } from '../extraction/schemas';
import type { EntityCandidate, ExtractionResult, RelationCandidate } from '../extraction/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface MutationPlan {
  entryId: string;
  entityCreates: EntityWrite[];
  entityMerges: EntityWrite[];
  relationCreates: RelationWrite[];
  relationMerges: RelationWrite[];
}

export interface PlanCounts {
  entitiesCreated: number;
  entitiesMerged: number;
  relationsCreated: number;
  relationsMerged: number;
}

export function planCounts(plan: MutationPlan): PlanCounts {
  return {
    entitiesCreated: plan.entityCreates.length,
    entitiesMerged: plan.entityMerges.length,
    relationsCreated: plan.relationCreates.length,
    relationsMerged: plan.relationMerges.length
  };
}

/** Ordered union, existing values first. */
function union(existing: readonly string[], added: readonly string[]): string[] {
  return [...new Set([...existing, ...added])];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════════════════

function planEntityCreate(candidate: EntityCandidate, entryId: string): EntityWrite {
  return {
    id: entityIdFor(candidate.identityKey),
    kind: candidate.kind,
    name: candidate.name,
    identityKey: candidate.identityKey,
    summary: candidate.summary,
    sourceEntryIds: [entryId]
  };
}

/**
 * Union of non-null fields; the newer summary wins when it has one.
 * The stored display name is kept.
 */
function planEntityMerge(existing: Entity, candidate: EntityCandidate, entryId: string): EntityWrite {
  return {
    id: existing.id,
    kind: existing.kind,
    name: existing.name,
    identityKey: candidate.identityKey,
    summary: candidate.summary ?? existing.summary,
    sourceEntryIds: union(existing.sourceEntryIds, [entryId])
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Relations
// ═══════════════════════════════════════════════════════════════════════════════

function planRelationMerge(existing: Relation, candidate: RelationCandidate, entryId: string): RelationWrite {
  return {
    id: existing.id,
    sourceId: existing.sourceId,
    targetId: existing.targetId,
    kind: existing.kind,
    confidence: maxConfidence(existing.confidence, candidate.confidence),
    sourceEntryIds: union(existing.sourceEntryIds, [entryId])
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Resolution
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compute the mutation plan for one extraction result.
 */
export async function resolveExtraction(
  result: ExtractionResult,
  reader: GraphReader
): Promise<MutationPlan> {
  const { entryId } = result;
  const plan: MutationPlan = {
    entryId,
    entityCreates: [],
    entityMerges: [],
    relationCreates: [],
    relationMerges: []
  };

  // identity key -> entity id, seeded with the entry itself
  const ids = new Map<string, string>([[entryIdentityKey(entryId), entryId]]);

  const existingEntities = await reader.findEntitiesByIdentity(
    result.entities.map((entity) => entity.identityKey)
  );

  for (const candidate of result.entities) {
    const existing = existingEntities.get(candidate.identityKey);
    const write = existing
      ? planEntityMerge(existing, candidate, entryId)
      : planEntityCreate(candidate, entryId);
    (existing ? plan.entityMerges : plan.entityCreates).push(write);
    ids.set(candidate.identityKey, write.id);
  }

  const resolved = result.relations.map((candidate) => {
    const sourceId = ids.get(candidate.sourceKey);
    const targetId = ids.get(candidate.targetKey);
    if (sourceId === undefined || targetId === undefined) {
      throw new Error(
        `Relation ${candidate.sourceKey} -[${candidate.kind}]-> ${candidate.targetKey} references an unknown entity`
      );
    }
    return { candidate, sourceId, targetId };
  });

  const existingRelations = await reader.findRelations(
    resolved.map(({ candidate, sourceId, targetId }) => ({ sourceId, targetId, kind: candidate.kind }))
  );

  for (const { candidate, sourceId, targetId } of resolved) {
    const existing = existingRelations.get(relationKey(sourceId, candidate.kind, targetId));
    if (existing) {
      plan.relationMerges.push(planRelationMerge(existing, candidate, entryId));
    } else {
      plan.relationCreates.push({
        id: relationIdFor(sourceId, candidate.kind, targetId),
        sourceId,
        targetId,
        kind: candidate.kind,
        confidence: candidate.confidence,
        sourceEntryIds: [entryId]
      });
    }
  }

  return plan;
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ExtractionError('Extraction cancelled during commit', 'CANCELLED');
  }
}

/**
 * Apply a plan: entities first, since relations may point at entities
 * created by the same plan. The signal is checked before every write so an
 * abort fails the enclosing transaction.
 */
export async function applyPlan(plan: MutationPlan, writer: GraphWriter, signal?: AbortSignal): Promise<void> {
  throwIfCancelled(signal);
  await writer.createEntities(plan.entityCreates);
  throwIfCancelled(signal);
  await writer.mergeEntities(plan.entityMerges);
  throwIfCancelled(signal);
  await writer.createRelations(plan.relationCreates);
  throwIfCancelled(signal);
  await writer.mergeRelations(plan.relationMerges);
}

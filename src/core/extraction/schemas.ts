/**
 * Extraction Output Validation
 *
 * Providers return loosely shaped JSON. This module validates it and folds
 * one or more segments' worth of output into identity-keyed candidates.
 */

import { z } from 'zod';
import { RELS } from '@/providers/graph/neo4j/constants';
import { ENTRY_KIND } from '@/providers/graph/types';
import { entryIdentityKey, identityKey, normalizeKind, normalizeName } from '@/providers/graph/utils';
import { ProviderError } from './errors';
import type { EntityCandidate, RelationCandidate } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Raw Output Schema
// ═══════════════════════════════════════════════════════════════════════════════

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

/**
 * Entities accept `kind`, or the first of `system_labels` as some models
 * emit graph-style labels.
 */
export const RawEntitySchema = z
  .object({
    name: z.string().trim().min(1),
    kind: z.string().optional(),
    system_labels: z.array(z.string()).optional(),
    summary: optionalText
  })
  .transform((entity, ctx) => {
    const kind = entity.kind ?? entity.system_labels?.[0];
    if (kind === undefined) {
      ctx.addIssue({ code: 'custom', message: `entity "${entity.name}" has no kind` });
      return z.NEVER;
    }
    return { name: entity.name, kind, summary: entity.summary ?? null };
  });

export const RawRelationSchema = z
  .object({
    source: z.string().trim().min(1),
    target: z.string().trim().min(1),
    kind: z.string().optional(),
    relationType: z.string().optional(),
    confidence: z.number().min(0).max(1).nullish()
  })
  .transform((relation, ctx) => {
    const kind = relation.kind ?? relation.relationType;
    if (kind === undefined) {
      ctx.addIssue({
        code: 'custom',
        message: `relation ${relation.source} -> ${relation.target} has no kind`
      });
      return z.NEVER;
    }
    return {
      source: relation.source,
      target: relation.target,
      kind,
      confidence: relation.confidence ?? null
    };
  });

export const RawExtractionSchema = z.object({
  entities: z.array(RawEntitySchema),
  relations: z.array(RawRelationSchema)
});

function invalid(message: string): ProviderError {
  return new ProviderError(message, 'INVALID_RESPONSE');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate Set
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Accumulates validated candidates across an entry's segments.
 *
 * - Entities dedupe by identity key; a later non-null summary wins.
 * - Relations dedupe by (source, kind, target) and keep the max confidence.
 * - Relation endpoints are names (or the entry id); they resolve against
 *   every entity seen so far, in any segment.
 */
export class CandidateSet {
  private readonly entities = new Map<string, EntityCandidate>();
  private readonly relations = new Map<string, RelationCandidate>();
  /** normalized name -> identity key of its first entity */
  private readonly names = new Map<string, string>();
  private readonly entryKey: string;

  constructor(private readonly entryId: string) {
    this.entryKey = entryIdentityKey(entryId);
  }

  /**
   * Validate one provider output and fold it in.
   * Throws ProviderError(INVALID_RESPONSE) on any shape mismatch; the set
   * is left untouched in that case.
   */
  addRaw(raw: unknown): void {
    const parsed = RawExtractionSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw invalid(
        `Output does not match the extraction schema${
          issue ? ` at ${issue.path.map(String).join('.') || '(root)'}: ${issue.message}` : ''
        }`
      );
    }

    const entities = parsed.data.entities.map((entity) => {
      const kind = normalizeKind(entity.kind);
      if (kind === null) throw invalid(`Invalid entity kind "${entity.kind}"`);
      if (kind === ENTRY_KIND) throw invalid(`Entity "${entity.name}" uses reserved kind ${ENTRY_KIND}`);
      return {
        identityKey: identityKey(kind, entity.name),
        kind,
        name: entity.name,
        summary: entity.summary ?? null
      };
    });

    const names = new Map(this.names);
    for (const entity of entities) {
      const name = normalizeName(entity.name);
      if (!names.has(name)) names.set(name, entity.identityKey);
    }

    const relations = parsed.data.relations.map((relation) => {
      const kind = normalizeKind(relation.kind);
      if (kind === null) throw invalid(`Invalid relation kind "${relation.kind}"`);
      return {
        sourceKey: this.resolveEndpoint(relation.source, names),
        targetKey: this.resolveEndpoint(relation.target, names),
        kind,
        confidence: relation.confidence
      };
    });

    // Validation passed; commit
    for (const [name, key] of names) this.names.set(name, key);
    for (const entity of entities) this.addEntity(entity);
    for (const relation of relations) this.addRelation(relation);
  }

  private resolveEndpoint(endpoint: string, names: Map<string, string>): string {
    if (endpoint.trim() === this.entryId) return this.entryKey;
    const key = names.get(normalizeName(endpoint));
    if (key === undefined) {
      throw invalid(`Relation endpoint "${endpoint}" is neither the entry nor an extracted entity`);
    }
    return key;
  }

  private addEntity(entity: EntityCandidate): void {
    const existing = this.entities.get(entity.identityKey);
    if (!existing) {
      this.entities.set(entity.identityKey, entity);
      return;
    }
    if (entity.summary !== null) {
      this.entities.set(entity.identityKey, { ...existing, summary: entity.summary });
    }
  }

  private addRelation(relation: RelationCandidate): void {
    if (relation.sourceKey === relation.targetKey) return;
    const key = `${relation.sourceKey}|${relation.kind}|${relation.targetKey}`;
    const existing = this.relations.get(key);
    if (!existing) {
      this.relations.set(key, relation);
      return;
    }
    this.relations.set(key, {
      ...existing,
      confidence: maxConfidence(existing.confidence, relation.confidence)
    });
  }

  /**
   * Candidates in first-seen order. Every entity gets a MENTIONS relation
   * from the entry if no segment produced one.
   */
  finalize(): { entities: EntityCandidate[]; relations: RelationCandidate[] } {
    for (const entity of this.entities.values()) {
      this.addRelation({
        sourceKey: this.entryKey,
        targetKey: entity.identityKey,
        kind: RELS.MENTIONS,
        confidence: null
      });
    }
    return {
      entities: [...this.entities.values()],
      relations: [...this.relations.values()]
    };
  }
}

export function maxConfidence(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

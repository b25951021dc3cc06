/**
 * Graph Provider Utilities
 *
 * Identifier generation and identity-key helpers shared by the
 * graph provider and the resolver.
 */

import { v5 as uuidv5, v7 as uuidv7 } from 'uuid';
import { ENTRY_KIND } from './types';

/** Namespace for name-derived UUIDs (v5). */
const IDENTITY_NAMESPACE = '6f1c2b7e-4a1d-4e8b-9c3f-2d5a7b8e9f10';

const KIND_PATTERN = /^[A-Z][A-Z0-9_]*$/;

/**
 * Generate a UUID v7 (time-ordered, sortable).
 */
export function generateId(): string {
  return uuidv7();
}

/**
 * Get current timestamp in ISO 8601 format.
 */
export function now(): string {
  return new Date().toISOString();
}

// ============================================================
// IDENTITY
// ============================================================

/**
 * Normalize a display name for identity comparison.
 *
 *   "  Paris " -> "paris"
 *   "New\tYork" -> "new york"
 */
export function normalizeName(name: string): string {
  return name.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Normalize a provider-supplied kind to upper snake_case.
 * Returns null when nothing usable remains.
 *
 *   "located in" -> "LOCATED_IN"
 *   "met-at" -> "MET_AT"
 */
export function normalizeKind(kind: string): string | null {
  const normalized = kind
    .normalize('NFKC')
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return isValidKind(normalized) ? normalized : null;
}

/**
 * Kinds end up in Cypher labels and relationship types, which cannot be
 * parameterized. Only values passing this check are ever interpolated.
 */
export function isValidKind(kind: string): boolean {
  return KIND_PATTERN.test(kind);
}

/** Identity key of an extracted entity: `KIND:normalized name`. */
export function identityKey(kind: string, name: string): string {
  return `${kind}:${normalizeName(name)}`;
}

/** Identity key of an entry node. */
export function entryIdentityKey(entryId: string): string {
  return `${ENTRY_KIND}:${entryId}`;
}

/** Deterministic entity id for an identity key. */
export function entityIdFor(key: string): string {
  return uuidv5(key, IDENTITY_NAMESPACE);
}

/** Lookup key for a relation triple. */
export function relationKey(sourceId: string, kind: string, targetId: string): string {
  return `${sourceId}|${kind}|${targetId}`;
}

/** Deterministic relation id for a triple. */
export function relationIdFor(sourceId: string, kind: string, targetId: string): string {
  return uuidv5(relationKey(sourceId, kind, targetId), IDENTITY_NAMESPACE);
}

/**
 * Core
 *
 * Public API barrel file. Re-exports extraction, resolution and ingestion.
 *
 * @example
 * ```typescript
 * import { EntryIngestionService, ExtractionRunner } from '@/core';
 * ```
 */

export { NotFoundError, ValidationError, type ValidationErrorKind } from './errors';

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════════════

export * from './extraction';

// ═══════════════════════════════════════════════════════════════════════════════
// Resolution
// ═══════════════════════════════════════════════════════════════════════════════

export * from './resolution';

// ═══════════════════════════════════════════════════════════════════════════════
// Ingestion
// ═══════════════════════════════════════════════════════════════════════════════

export * from './ingestion';

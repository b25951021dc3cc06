/**
 * Extraction Types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Provider Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One provider call: a single segment of one entry.
 */
export interface ExtractionRequest {
  entryId: string;
  /** Segment text, already within the token budget */
  text: string;
  /** Whether the entry was cut to fit the context window */
  truncated: boolean;
  contextWindowTokens: number;
}

/**
 * A pluggable extraction backend.
 *
 * Returns raw structured output (a parsed JSON value); the runner validates
 * its shape. Failures are ProviderErrors. `signal` aborts the call on
 * timeout or cancellation.
 */
export interface ExtractionProvider {
  readonly name: string;
  extract(request: ExtractionRequest, signal: AbortSignal): Promise<unknown>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Result
// ═══════════════════════════════════════════════════════════════════════════════

export interface EntityCandidate {
  /** `KIND:normalized name` */
  identityKey: string;
  kind: string;
  name: string;
  summary: string | null;
}

/**
 * Endpoints are identity keys: an EntityCandidate's key, or the entry's
 * own `ENTRY:<id>` key.
 */
export interface RelationCandidate {
  sourceKey: string;
  targetKey: string;
  kind: string;
  confidence: number | null;
}

export interface ExtractionMetadata {
  provider: string;
  latencyMs: number;
  truncated: boolean;
  degraded: boolean;
  /** Provider calls made, retries and fallback included */
  attempts: number;
  segments: number;
}

/**
 * Validated output of one extraction. Consumed once by the resolver.
 */
export interface ExtractionResult {
  entryId: string;
  entities: readonly EntityCandidate[];
  relations: readonly RelationCandidate[];
  metadata: ExtractionMetadata;
}

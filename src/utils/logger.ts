/**
 * Logger
 *
 * Semantic logging for Engram operations:
 * - INGEST: Entry accepted (persisted and queued)
 * - EXTRACT: Extraction lifecycle (provider calls, fallback, outcome, commit)
 * - WARN: Errors that were swallowed (observer failures, status writes)
 *
 * Design principles:
 * - Action-oriented verbs (Accepted, Called, Fell back, Committed)
 * - Clear visual hierarchy with minimal nesting
 * - Show what matters, hide implementation details
 */

import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Truncate text to max length with ellipsis */
export function truncate(text: string, maxLength: number): string {
  // Normalize whitespace (collapse newlines and multiple spaces)
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength - 3)}...`;
}

/** First 8 characters of an id */
function shortId(id: string): string {
  return c.dim(`[${id.slice(0, 8)}]`);
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           '; // 11 chars to align with [HH:MM:SS] + space

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry Ingestion (INGEST)
// ═══════════════════════════════════════════════════════════════════════════════

export function logEntryAccepted(entryId: string, text: string): void {
  const time = c.dim(formatTime());
  console.log(`${time} ${c.cyan('INGEST')} ${shortId(entryId)} "${c.white(truncate(text, 60))}"`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Lifecycle (EXTRACT)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log the start of an extraction run.
 */
export function logExtractionStart(entryId: string, provider: string): void {
  const time = c.dim(formatTime());
  console.log(`${time} ${c.magenta('EXTRACT')} ${shortId(entryId)} via ${c.white(provider)}`);
}

export function logProviderCall(provider: string, attempt: number, segment: number): void {
  const retry = attempt > 1 ? c.yellow(` (attempt ${attempt})`) : '';
  console.log(`${INDENT}${c.dim('→')} ${provider} segment ${segment + 1}${retry}`);
}

export function logFallback(from: string, reason: string, message: string): void {
  console.log(
    `${INDENT}${c.yellow('↓ Fell back')} ${c.dim(`${from} → local`)} ${c.dim(`(${reason}: ${message})`)}`
  );
}

export function logExtractionSuccess(
  counts: { entities: number; relations: number },
  latencyMs: number,
  degraded: boolean
): void {
  const flag = degraded ? ` ${c.yellow('degraded')}` : '';
  console.log(
    `${INDENT}${c.brightGreen('✓ Extracted')} ${counts.entities} entities, ${counts.relations} relations ${c.dim(`(${latencyMs}ms)`)}${flag}`
  );
}

export function logExtractionFailure(kind: string, message: string, stage: string): void {
  console.log(`${INDENT}${c.brightRed(`✗ Failed during ${stage}`)} ${c.dim(`${kind}: ${truncate(message, 80)}`)}`);
}

export function logCommitted(counts: {
  entitiesCreated: number;
  entitiesMerged: number;
  relationsCreated: number;
  relationsMerged: number;
}): void {
  const parts = [
    `${c.cyan(`+${counts.entitiesCreated}`)} entities`,
    `${c.dim(`~${counts.entitiesMerged}`)} merged`,
    `${c.cyan(`+${counts.relationsCreated}`)} relations`,
    `${c.dim(`~${counts.relationsMerged}`)} merged`
  ];
  console.log(`${INDENT}${c.dim('→ Committed:')} ${parts.join(', ')}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Warnings (WARN)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log an error that is deliberately not propagated.
 */
export function logWarning(context: string, error?: unknown): void {
  const time = c.dim(formatTime());
  const detail = error === undefined ? '' : ` ${c.dim(errorMessage(error))}`;
  console.warn(`${time} ${c.yellow('WARN')} ${context}${detail}`);
}

/**
 * Log an unhandled request error. The detail stays server-side.
 */
export function logRequestError(method: string, path: string, error: unknown): void {
  const time = c.dim(formatTime());
  console.error(`${time} ${c.red('ERROR')} ${method} ${path} ${c.dim(errorMessage(error))}`);
}

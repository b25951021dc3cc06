/**
 * Neo4j Error Handling & Session Management
 *
 * Provides error classification, retry logic, and the runCommand
 * orchestrator that eliminates session boilerplate from operations.
 */

import { type Driver, type ManagedTransaction, Neo4jError, type Session } from 'neo4j-driver';
import type { StoreErrorType } from '../types';
import { StoreError } from '../types';
import { RETRY } from './constants';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

/**
 * Read the driver's status code, if the error carries one.
 */
function errorCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code.toLowerCase();
  }
  return '';
}

/**
 * Map Neo4j-specific errors to a StoreErrorType.
 *
 * Categories:
 * - UNAVAILABLE: Network/availability issues
 * - CONSTRAINT_VIOLATION: Unique constraint failures (not retryable)
 * - TIMEOUT: Transaction timeout elapsed
 * - TRANSIENT: Deadlocks and other transient failures (retryable)
 * - QUERY_ERROR: Syntax or logic errors
 */
export function classifyNeo4jError(error: unknown): StoreErrorType {
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = errorCode(error);

  // Connection errors
  if (
    code === 'serviceunavailable' ||
    code === 'sessionexpired' ||
    message.includes('connection') ||
    message.includes('unavailable') ||
    message.includes('failed to connect')
  ) {
    return 'UNAVAILABLE';
  }

  // Constraint violations - not retryable
  if (message.includes('constraint') || message.includes('unique') || code.includes('constraint')) {
    return 'CONSTRAINT_VIOLATION';
  }

  // Timeouts terminate the transaction; the caller decides whether to retry
  if (code.includes('transactiontimedout') || message.includes('timeout')) {
    return 'TIMEOUT';
  }

  // Transient errors - retryable
  if (
    message.includes('deadlock') ||
    message.includes('transient') ||
    code.includes('transient') ||
    code.includes('deadlock')
  ) {
    return 'TRANSIENT';
  }

  return 'QUERY_ERROR';
}

/**
 * Wrap any failure in a StoreError. StoreErrors pass through untouched.
 */
export function toStoreError(error: unknown, operationName: string): StoreError {
  if (error instanceof StoreError) return error;
  return new StoreError(
    `${operationName} failed: ${error instanceof Error ? error.message : String(error)}`,
    classifyNeo4jError(error),
    error instanceof Error ? error : undefined
  );
}

/**
 * Check if an error indicates a schema element already exists.
 */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('equivalent') ||
      message.includes('already exists') ||
      message.includes('constraintalreadyexists') ||
      message.includes('indexalreadyexists')
    );
  }
  return false;
}

// ============================================================
// RETRY LOGIC
// ============================================================

/**
 * Execute an operation with exponential backoff retry for transient errors.
 *
 * Retry behavior:
 * - CONSTRAINT_VIOLATION: Fail immediately (not recoverable)
 * - TRANSIENT: Retry with exponential backoff
 * - Other errors: Fail after first attempt
 */
export async function withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
  let lastError: StoreError | undefined;

  for (let attempt = 0; attempt < RETRY.MAX_ATTEMPTS; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toStoreError(error, operationName);

      if (lastError.retryable && attempt < RETRY.MAX_ATTEMPTS - 1) {
        const delay = RETRY.BASE_DELAY_MS * 2 ** attempt;
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }

      throw lastError;
    }
  }

  throw new StoreError(
    `Operation ${operationName} failed after ${RETRY.MAX_ATTEMPTS} attempts: ${lastError?.message}`,
    'TRANSIENT',
    lastError
  );
}

// ============================================================
// SESSION LIFECYCLE MANAGEMENT
// ============================================================

export type CommandMode = 'read' | 'write';

export interface CommandContext {
  driver: Driver;
  database: string;
  /** Store-level transaction timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Unified session lifecycle orchestrator.
 *
 * Opens a session on the configured database, runs `operation` inside a
 * managed read or write transaction bounded by the store timeout and
 * always closes the session. Driver failures become StoreErrors; errors
 * thrown by `operation` itself pass through as they are.
 */
export async function runCommand<T>(
  ctx: CommandContext,
  mode: CommandMode,
  operation: (tx: ManagedTransaction) => Promise<T>,
  operationName: string
): Promise<T> {
  const session: Session = ctx.driver.session({ database: ctx.database });
  const config = { timeout: ctx.timeoutMs };
  try {
    return mode === 'read'
      ? await session.executeRead(operation, config)
      : await session.executeWrite(operation, config);
  } catch (error) {
    if (error instanceof Neo4jError) {
      throw toStoreError(error, operationName);
    }
    throw error;
  } finally {
    await session.close();
  }
}

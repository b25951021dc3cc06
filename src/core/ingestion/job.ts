/**
 * Extraction Job
 *
 * One background unit of work: extract an entry, resolve the result
 * against the graph and commit it, recording the outcome on the entry.
 *
 * The plan is resolved and applied inside one transaction together with
 * the `succeeded` status write, so a failure or cancellation at any point
 * leaves neither graph changes nor a success status behind. Every failure,
 * including the `running` status write, ends with the entry `failed`.
 */

import type { GraphClient } from '@/providers/graph/types';
import { StoreError } from '@/providers/graph/types';
import { logWarning } from '@/utils/logger';
import { ExtractionError } from '../extraction/errors';
import type { FailureStage, ObserverRegistry } from '../extraction/observers';
import type { ExtractionRunner } from '../extraction/runner';
import { applyPlan, planCounts, resolveExtraction, throwIfCancelled } from '../resolution/resolver';
import type { ExtractionHandler } from './dispatcher';

export interface ExtractionJobDependencies {
  graph: GraphClient;
  runner: ExtractionRunner;
  observers: ObserverRegistry;
}

/**
 * Error detail stored on a failed entry: `KIND: message`.
 */
export function describeFailure(error: unknown): { kind: string; message: string } {
  if (error instanceof ExtractionError) return { kind: error.kind, message: error.message };
  if (error instanceof StoreError) return { kind: `STORE_${error.type}`, message: error.message };
  return { kind: 'INTERNAL', message: error instanceof Error ? error.message : String(error) };
}

export function createExtractionJob(deps: ExtractionJobDependencies): ExtractionHandler {
  const { graph, runner, observers } = deps;

  const markFailed = async (entryId: string, detail: string): Promise<void> => {
    try {
      await graph.updateEntryStatus(entryId, { status: 'failed', error: detail });
    } catch (error) {
      logWarning(`Could not record failure on entry ${entryId}:`, error);
    }
  };

  return async (entryId, signal) => {
    const entry = await graph.getEntry(entryId);
    if (!entry) {
      logWarning(`Entry ${entryId} no longer exists; skipping extraction`);
      return;
    }

    let stage: FailureStage = 'start';
    try {
      await graph.updateEntryStatus(entryId, { status: 'running', error: null });

      stage = 'extraction';
      const result = await runner.run({ entryId, text: entry.text }, signal);

      stage = 'commit';
      const plan = await graph.executeTransaction(async (tx) => {
        const plan = await resolveExtraction(result, tx);
        await applyPlan(plan, tx, signal);
        throwIfCancelled(signal);
        await tx.updateEntryStatus(entryId, {
          status: 'succeeded',
          error: null,
          degraded: result.metadata.degraded
        });
        return plan;
      });

      observers.notify({ type: 'committed', entryId, ...planCounts(plan) });
    } catch (error) {
      const { kind, message } = describeFailure(error);
      // The runner reports its own failures
      if (stage !== 'extraction') {
        observers.notify({ type: 'failed', entryId, kind, message, stage });
      }
      await markFailed(entryId, `${kind}: ${message}`);
    }
  };
}

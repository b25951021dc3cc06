/**
 * Ingestion Harness
 *
 * Wires the real runner, dispatcher, job and service around an in-memory
 * graph, the same way the server does at startup.
 */

import type { ProviderConfig } from '@/config/schema';
import { ObserverRegistry, type PipelineEvent } from '@/core/extraction/observers';
import { LocalHeuristicProvider } from '@/core/extraction/providers/local';
import { ExtractionRunner } from '@/core/extraction/runner';
import type { ExtractionProvider } from '@/core/extraction/types';
import { type DispatcherOptions, ExtractionDispatcher } from '@/core/ingestion/dispatcher';
import { createExtractionJob } from '@/core/ingestion/job';
import { EntryIngestionService } from '@/core/ingestion/service';
import { makeProviderConfig } from './fixtures';
import { InMemoryGraphClient } from './in-memory-graph';

export interface HarnessOptions {
  provider?: ExtractionProvider;
  config?: Partial<ProviderConfig>;
  dispatcher?: Partial<DispatcherOptions>;
}

export function createHarness(options: HarnessOptions = {}) {
  const graph = new InMemoryGraphClient();
  const events: PipelineEvent[] = [];
  const observers = new ObserverRegistry([{ name: 'recorder', onEvent: (event) => void events.push(event) }]);
  const provider = options.provider ?? new LocalHeuristicProvider();
  const runner = new ExtractionRunner({
    config: makeProviderConfig({ provider: 'local', connection: null, ...options.config }),
    provider,
    observers
  });
  const dispatcher = new ExtractionDispatcher(createExtractionJob({ graph, runner, observers }), {
    concurrency: 2,
    maxQueueSize: 10,
    ...options.dispatcher
  });
  const service = new EntryIngestionService(graph, dispatcher);

  return { graph, events, dispatcher, service };
}

/**
 * Shared Client Initialization
 *
 * Builds the graph client, extraction runner, dispatcher and ingestion
 * service once per process from the loaded configuration.
 */

import type { Config } from '@/config/schema';
import {
  createExtractionJob,
  createExtractionProvider,
  EntryIngestionService,
  ExtractionDispatcher,
  ExtractionRunner,
  LoggingObserver,
  ObserverRegistry
} from '@/core';
import { createGraphClient } from '@/providers/graph';
import type { GraphClient } from '@/providers/graph/types';

/**
 * Long-lived collaborators shared by every request.
 */
export interface Clients {
  graph: GraphClient;
  observers: ObserverRegistry;
  runner: ExtractionRunner;
  dispatcher: ExtractionDispatcher;
  service: EntryIngestionService;
}

/** Cached clients instance */
let clients: Clients | null = null;
let initPromise: Promise<Clients> | null = null;

/**
 * Get initialized clients.
 * Concurrent callers share one initialization.
 */
export async function getClients(config: Readonly<Config>): Promise<Clients> {
  if (clients) return clients;

  if (!initPromise) {
    initPromise = initializeClients(config);
  }

  clients = await initPromise;
  return clients;
}

/**
 * Connect the graph store and wire the extraction pipeline.
 */
async function initializeClients(config: Readonly<Config>): Promise<Clients> {
  const graph = createGraphClient(config.graph);
  await graph.connect();
  await graph.initializeSchema();

  const observers = new ObserverRegistry([new LoggingObserver()]);
  const runner = new ExtractionRunner({
    config: config.provider,
    provider: createExtractionProvider(config.provider),
    observers
  });
  const dispatcher = new ExtractionDispatcher(
    createExtractionJob({ graph, runner, observers }),
    config.dispatcher
  );
  const service = new EntryIngestionService(graph, dispatcher);

  return { graph, observers, runner, dispatcher, service };
}

/**
 * Abort in-flight extractions and close the graph driver.
 * Returns entry ids that were still queued; they are marked failed.
 */
export async function closeClients(): Promise<string[]> {
  if (!clients) return [];
  const { service, graph } = clients;
  clients = null;
  initPromise = null;
  const dropped = await service.shutdown();
  await graph.disconnect();
  return dropped;
}

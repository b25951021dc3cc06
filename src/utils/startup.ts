/**
 * Startup Display
 *
 * Displays initialization steps and server info.
 */

import type { Config } from '@/config/schema';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupInfo {
  /** Neo4j connection URI and database */
  graph: string;
  /** Active extraction provider, with model where there is one */
  provider: string;
  /** Fallback policy line */
  fallback: string;
  /** Dispatcher sizing */
  workers: string;
}

/** Divider line */
const DIVIDER = '━'.repeat(70);

const ENDPOINTS: Array<[method: string, path: string, description: string]> = [
  ['POST', '/graph/entries', 'Ingest an entry (extraction runs in background)'],
  ['GET', '/graph/entries/:id', 'Entry status'],
  ['GET', '/graph/entities', 'List entities (offset, limit)'],
  ['GET', '/graph/entities/:id', 'Entity by id'],
  ['GET', '/graph/entities/:id/relations', 'Relations of an entity'],
  ['DELETE', '/graph/entities/:id', 'Delete an entity'],
  ['POST', '/graph/search/text', 'Substring search'],
  ['POST', '/graph/search/semantic', 'Semantic search (text proxy)'],
  ['GET', '/health', 'Health check']
];

/**
 * Log an initialization step with checkmark.
 */
function logStep(label: string, detail?: string): void {
  const padding = Math.max(1, 26 - label.length);
  const detailText = detail ? c.dim(detail) : '';
  console.log(`  ${c.brightGreen('✓')} ${c.white(label)}${' '.repeat(padding)}${detailText}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodColor = method === 'GET' ? c.brightGreen : c.brightYellow;
  console.log(
    `    • ${methodColor(method.padEnd(6))} ${c.cyan(path.padEnd(31))} ${c.dim(description)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Display the startup checklist and endpoint table.
 * The banner is displayed separately before calling this.
 */
export function displayStartup(config: Readonly<Config>, info: StartupInfo): void {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  logStep('Configuration loaded');
  logStep('Neo4j connected', info.graph);
  logStep('Extraction provider ready', info.provider);
  logStep('Fallback policy', info.fallback);
  logStep('Dispatcher started', info.workers);

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${config.server.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  for (const [method, path, description] of ENDPOINTS) {
    displayEndpoint(method, path, description);
  }

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

/**
 * Build startup info from config.
 */
export function buildStartupInfo(config: Readonly<Config>): StartupInfo {
  const { provider } = config;
  return {
    graph: `${config.graph.uri} (${config.graph.database})`,
    provider: provider.connection
      ? `${provider.connection.name}/${provider.connection.model}`
      : 'local heuristic',
    fallback: provider.allowFallback ? 'fall back to local heuristic' : 'fail fast',
    workers: `${config.dispatcher.concurrency} workers, queue ${config.dispatcher.maxQueueSize}`
  };
}

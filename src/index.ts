/**
 * Engram Server Entry Point
 *
 * Loads configuration, connects the graph store, wires the extraction
 * pipeline and serves the HTTP API on Node.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { closeClients, getClients } from '@/server/clients';
import { createApp } from '@/server/index';
import { buildStartupInfo, displayBanner, displayStartup, logWarning } from '@/utils';

// Display banner immediately
displayBanner();

const config = getConfig();
const { graph, service } = await getClients(config);
const app = createApp({ service, graph });

const server = serve({ fetch: app.fetch, port: config.server.port }, () => {
  displayStartup(config, buildStartupInfo(config));
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n  Received ${signal}, shutting down...`);

  server.close();
  const dropped = await closeClients();
  if (dropped.length > 0) {
    logWarning(`${dropped.length} queued entries cancelled:`, dropped.join(', '));
  }
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logWarning('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

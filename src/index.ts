/**
 * Application Entry Point
 *
 * Starts the Express HTTP server with the enrichment pool in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Build the text-generation backend, extraction engine and record store
 * 3. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Wait for queued and running enrichment tasks to finish
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { appConfig } from './config.js';
import { EnrichmentPool } from './enrichment/pool.js';
import { extractionConfig } from './extraction/config.js';
import { ExtractionEngine } from './extraction/engine.js';
import { createGenerator } from './generator/index.js';
import { createApp } from './server/server.js';
import { createRecordStore } from './store/index.js';

async function main() {
  console.log('[startup] Mail enrichment service starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Model backend:', extractionConfig.backend);

  const generator = createGenerator(extractionConfig);
  const engine = new ExtractionEngine(generator, extractionConfig);
  const store = createRecordStore();
  const pool = new EnrichmentPool(appConfig.enrichment.workers);
  console.log('[startup] Record store:', store.name);
  console.log('[startup] Enrichment workers:', pool.concurrency);

  // Start Express server
  const app = createApp({
    store,
    pool,
    engine,
    heuristic: {
      urgencyKeywords: extractionConfig.urgencyKeywords,
      rules: extractionConfig.categoryRules,
    },
  });
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down...`);

    // Stop accepting new connections
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    // Let in-flight enrichment finish
    console.log('[shutdown] Waiting for enrichment pool', { active: pool.active, pending: pool.pending });
    await pool.onIdle();
    console.log('[shutdown] Enrichment pool drained');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  console.error('[startup] Fatal error:', err);
  process.exit(1);
});

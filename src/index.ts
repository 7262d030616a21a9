/**
 * Address Attribution Ledger - Main Entry Point
 * Cross-source consolidation of blockchain address attribution
 *
 * This module provides the main exports and entry points for:
 * - API server
 * - Reconsolidation job
 * - Engine and service classes
 */

// Load environment variables
import 'dotenv/config';

import { fileURLToPath } from 'url';

// Export engine and services
export { AttributionEngine, createAttributionEngine } from './services/attribution-engine.js';
export type { AttributionEngineDeps, BatchRequestOptions } from './services/attribution-engine.js';
export { ConsensusEngine } from './services/consensus-engine.js';
export { ConfidenceClassifier, levelForScore, confidenceLabel } from './services/confidence-classifier.js';
export { ConflictDetector } from './services/conflict-detector.js';
export { BatchOrchestrator } from './services/batch-orchestrator.js';
export { ResultCache, cacheKey } from './services/result-cache.js';
export { PostgresAttributionStore } from './services/attribution-store.js';
export type { AttributionStore } from './services/attribution-store.js';
export * from './services/adapters/index.js';

// Export collaborators
export * from './collaborators/index.js';
export { createPostgresCollaborators } from './collaborators/postgres.js';

// Export job orchestrator
export { JobOrchestrator } from './jobs/orchestrator.js';

// Export API server
export { createApp, startServer } from './api/server.js';

// Export database utilities
export { getConnection, closeConnection, healthCheck } from './db/connection.js';

// Export configuration
export { DEFAULT_SOURCE_WEIGHTS, SUPPORTED_BLOCKCHAINS } from './config/constants.js';
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from './config/engine.js';
export type { EngineConfig } from './config/engine.js';

// Export types and errors
export * from './types/index.js';
export * from './utils/errors.js';

// ============================================================================
// MAIN FUNCTION
// ============================================================================

import { serializeConsolidation } from './api/serializers.js';
import { healthCheck, closeConnection } from './db/connection.js';
import { createRuntime, type Runtime } from './runtime.js';
import { logger } from './utils/logger.js';

/**
 * Resolves to the exit code, or null while the server keeps running
 */
async function main(): Promise<number | null> {
  const command = process.argv[2];
  const args = process.argv.slice(3);

  switch (command) {
    case 'serve':
    case 'server':
    case 'api': {
      const { startServer } = await import('./api/server.js');
      const runtime = createRuntime();
      const port = parseInt(process.env.PORT || '3000', 10);
      const server = await startServer(runtime.engine, port);

      const shutdown = () => {
        logger.info('Shutting down');
        server.close(() => {
          runtime.close().then(
            () => process.exit(0),
            (error: unknown) => {
              logger.error({ error }, 'Failed to close database connection');
              process.exit(1);
            }
          );
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      return null;
    }

    case 'consolidate':
      return withRuntime(runtime => consolidate(runtime, args));

    case 'reconsolidate':
      return withRuntime(async runtime => {
        const { JobOrchestrator, runFromCLI } = await import('./jobs/orchestrator.js');
        const ok = await runFromCLI(args, new JobOrchestrator(runtime.engine, runtime.store));
        return ok ? 0 : 1;
      });

    case 'stats':
      return withRuntime(async runtime => {
        const days = parseInt(args[0] ?? '30', 10);
        const statistics = await runtime.engine.getStatistics(Number.isNaN(days) ? 30 : days);
        console.log(JSON.stringify(statistics, null, 2));
        return 0;
      });

    case 'status':
    default: {
      const ok = await showStatus();
      await closeConnection();
      return ok ? 0 : 1;
    }
  }
}

async function withRuntime(run: (runtime: Runtime) => Promise<number>): Promise<number> {
  const runtime = createRuntime();
  try {
    return await run(runtime);
  } finally {
    await runtime.close();
  }
}

/**
 * consolidate <blockchain> <address...>
 */
async function consolidate(runtime: Runtime, args: string[]): Promise<number> {
  const [blockchain, ...addresses] = args;
  if (!blockchain || addresses.length === 0) {
    console.log('Usage: consolidate <blockchain> <address...>');
    return 1;
  }

  const results = await runtime.engine.consolidateMany(addresses, blockchain, {
    onProgress: (completed, total, address) => {
      logger.info({ completed, total, address }, 'Consolidated');
    },
  });

  const output: Record<string, unknown> = {};
  for (const [address, consolidation] of results) {
    output[address] = consolidation ? serializeConsolidation(consolidation) : null;
  }
  console.log(JSON.stringify(output, null, 2));
  return 0;
}

async function showStatus(): Promise<boolean> {
  console.log('Address Attribution Ledger v0.1.0');
  console.log('=================================\n');
  console.log('Checking database connection...');
  const isHealthy = await healthCheck();

  if (isHealthy) {
    console.log('Database connection: OK');
  } else {
    console.log('Database connection: FAILED');
    console.log('Check your database configuration in .env');
  }

  console.log('\n---');
  console.log('Commands:');
  console.log('  serve                                   - Start API server');
  console.log('  consolidate <blockchain> <address...>   - Consolidate addresses and print the result');
  console.log('  reconsolidate [olderThanHours] [limit]  - Refresh stale stored consolidations');
  console.log('  stats [days]                            - Print statistics');
  console.log('  status                                  - Check configuration');
  return isHealthy;
}

// Run if executed directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main()
    .then(code => {
      if (code !== null) process.exit(code);
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'Fatal error');
      process.exit(1);
    });
}

/**
 * Runtime wiring
 * Builds the engine against PostgreSQL for the server, CLI and jobs
 */

import { createPostgresCollaborators } from './collaborators/postgres.js';
import { loadEngineConfig, type EngineConfig } from './config/engine.js';
import { closeConnection, getConnection } from './db/connection.js';
import { createAttributionEngine, type AttributionEngine } from './services/attribution-engine.js';
import { PostgresAttributionStore } from './services/attribution-store.js';
import { logger } from './utils/logger.js';

export interface Runtime {
  config: EngineConfig;
  engine: AttributionEngine;
  store: PostgresAttributionStore;
  close(): Promise<void>;
}

export function createRuntime(config: EngineConfig = loadEngineConfig()): Runtime {
  const sql = getConnection();
  const store = new PostgresAttributionStore(logger, sql);
  const engine = createAttributionEngine({
    config,
    collaborators: createPostgresCollaborators(sql),
    store,
    logger,
  });

  return {
    config,
    engine,
    store,
    close: closeConnection,
  };
}

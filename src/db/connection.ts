/**
 * Database Connection Module
 * Provides PostgreSQL connection pool using 'postgres' driver
 */

import postgres from 'postgres';
import { databaseConfig, getDatabaseUrl } from '../config/database.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// Singleton connection instance
let sql: postgres.Sql | null = null;

/**
 * Get or create the database connection
 */
export function getConnection(): postgres.Sql {
  if (!sql) {
    sql = postgres(getDatabaseUrl(), {
      max: databaseConfig.poolSize,
      idle_timeout: 30,
      connect_timeout: 10,
      transform: {
        undefined: null,
      },
    });
  }
  return sql;
}

/**
 * Close the database connection
 */
export async function closeConnection(): Promise<void> {
  if (sql) {
    await sql.end();
    sql = null;
  }
}

/**
 * Health check
 */
export async function healthCheck(connection: postgres.Sql = getConnection()): Promise<boolean> {
  try {
    const result = await connection`SELECT 1 as ok`;
    return result.length > 0;
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Database health check failed');
    return false;
  }
}

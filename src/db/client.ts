/**
 * Database Client Module
 *
 * Picks the storage backend: PostgreSQL when a connection string is
 * configured, the embedded SQLite file otherwise.
 */

import { logger } from '../core/logger.js';
import type { AppConfig } from '../core/config.js';
import type { Backend } from './backend.js';
import { PostgresBackend, poolSource } from './postgresBackend.js';
import { SqliteBackend } from './sqliteBackend.js';

/**
 * Creates the backend selected by configuration
 *
 * No connection is attempted here; see `waitForBackend`.
 */
export function createBackend(database: AppConfig['database']): Backend {
  if (database.url) {
    logger.info('Using PostgreSQL backend');
    return new PostgresBackend(poolSource({
      connectionString: database.url,
      ssl: database.ssl,
      max: database.max,
      idleTimeoutMillis: database.idleTimeoutMillis,
      connectionTimeoutMillis: database.connectionTimeoutMillis
    }));
  }

  logger.info({ path: database.path }, 'Using SQLite backend');
  return new SqliteBackend(database.path);
}

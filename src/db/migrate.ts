/**
 * Database Migration Runner
 *
 * Runs SQL migration files in order to set up the database schema.
 * Each backend kind has its own directory of migrations.
 */

import { readdirSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { createBackend } from './client.js';
import type { Backend, BackendKind } from './backend.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Directory holding the migrations for a backend kind
 */
export function migrationsDir(kind: BackendKind): string {
  // Migrations are in src/db/migrations/<kind>
  // When running from dist/db/migrate.js, go through cwd back to src
  const isDist = __dirname.includes('/dist/');
  const base = isDist
    ? join(process.cwd(), 'src/db/migrations')
    : join(__dirname, 'migrations');
  return join(base, kind);
}

/**
 * Runs all migration files in order
 *
 * Statements are idempotent (IF NOT EXISTS), so every file runs on every start.
 */
export async function runMigrations(backend: Backend): Promise<void> {
  const dir = migrationsDir(backend.kind);
  const migrations = readdirSync(dir).filter(f => f.endsWith('.sql')).sort();

  for (const migrationFile of migrations) {
    try {
      const sql = readFileSync(join(dir, migrationFile), 'utf-8');
      await backend.runScript(sql);
      logger.info({ migration: migrationFile, backend: backend.kind }, 'Migration applied successfully');
    } catch (err) {
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw err;
    }
  }

  logger.info('All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('migrate.ts')) {
  const backend = createBackend(cfg.database);
  runMigrations(backend)
    .then(async () => {
      await backend.close();
      logger.info('Migrations completed');
      process.exit(0);
    })
    .catch((err) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}

/**
 * Application Service
 * 
 * Main application orchestration logic.
 * Handles configuration checks, storage start-up, the API server, the
 * scrape schedule and graceful shutdown.
 */

import type { Server } from 'http';
import { cfg } from '../core/config.js';
import type { AppConfig } from '../core/config.js';
import { QUERY_LIMITS } from '../core/constants.js';
import { logger } from '../core/logger.js';
import { createApp, startServer, stopServer } from '../api/server.js';
import type { Backend } from '../db/backend.js';
import { createBackend } from '../db/client.js';
import { runMigrations } from '../db/migrate.js';
import { toError } from '../errors/index.js';
import { createPlaywrightDriver } from '../scraper/playwrightDriver.js';
import { waitForBackend } from '../util/waitForServices.js';
import { assertNumberAtLeast, isValidUrl, ValidationError } from '../util/validation.js';
import { runScrapePass } from './scrapeOrchestrator.js';
import { ScrapeScheduler } from './scrapeScheduler.js';

/**
 * Rejects configuration the service cannot run with
 * 
 * @throws ValidationError naming the first offending setting
 */
export function validateConfig(config: AppConfig): void {
  if (!isValidUrl(config.scrape.url)) {
    throw new ValidationError(`Invalid scrape URL: ${config.scrape.url}`, 'SCRAPE_URL');
  }
  if (config.scrape.game.trim() === '') {
    throw new ValidationError('Game label must not be empty', 'SCRAPE_GAME');
  }
  assertNumberAtLeast(config.scrape.intervalSeconds, 'SCRAPE_INTERVAL_SECONDS', 0);
  assertNumberAtLeast(config.scrape.navigationTimeoutMs, 'NAVIGATION_TIMEOUT_MS', 1);
  assertNumberAtLeast(config.scrape.tableTimeoutMs, 'TABLE_TIMEOUT_MS', 1);
  assertNumberAtLeast(config.scrape.tableSettleMs, 'TABLE_SETTLE_MS', 1);
  assertNumberAtLeast(config.queries.maxTimestampColumns, 'MAX_TS_COLUMNS', 1);
  if (config.queries.maxTimestampColumns > QUERY_LIMITS.MAX_LIMIT) {
    throw new ValidationError(`MAX_TS_COLUMNS must be at most ${QUERY_LIMITS.MAX_LIMIT}`, 'MAX_TS_COLUMNS');
  }
  assertNumberAtLeast(config.api.port, 'PORT', 0);
}

/**
 * Sets up graceful shutdown handlers
 * 
 * @param controller - AbortController to signal shutdown to the scrape loop
 */
function setupShutdownHandlers(controller: AbortController, backend: Backend, getServer: () => Server | null): void {
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    controller.abort();

    const server = getServer();
    if (server) {
      try {
        await stopServer(server);
      } catch (err) {
        logger.warn({ err }, 'Error stopping API server');
      }
    }

    try {
      await backend.close();
    } catch (err) {
      logger.warn({ err }, 'Error closing database connections');
    }

    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

/**
 * Main application logic
 * 
 * 1. Validates configuration
 * 2. Connects to the storage backend and runs migrations
 * 3. Starts the API server (if enabled)
 * 4. Runs a pass at start (if enabled), then on the interval (if set)
 */
export async function startApp(): Promise<void> {
  validateConfig(cfg);

  const backend = createBackend(cfg.database);
  await waitForBackend(backend);
  await runMigrations(backend);

  const driver = createPlaywrightDriver(cfg);
  const scheduler = new ScrapeScheduler(() => runScrapePass({
    driver,
    backend,
    game: cfg.scrape.game,
    filters: cfg.scrape.filters
  }));

  // Create abort controller for graceful shutdown
  const controller = new AbortController();
  let server: Server | null = null;
  setupShutdownHandlers(controller, backend, () => server);

  if (cfg.api.enabled) {
    const app = createApp(
      { backend, scheduler, defaultColumns: cfg.queries.maxTimestampColumns },
      { corsOrigins: cfg.api.corsOrigins }
    );
    server = await startServer(app, cfg.api.port);
  }

  const intervalMs = cfg.scrape.intervalSeconds * 1000;

  if (intervalMs > 0) {
    await scheduler.runEvery(intervalMs, controller.signal, { runFirst: cfg.scrape.onStart });
  } else if (cfg.scrape.onStart) {
    try {
      const result = await scheduler.trigger();
      if (result.started) {
        logger.info({ status: result.summary.status, batchId: result.summary.batchId }, 'Single pass finished');
      }
    } catch (err) {
      logger.error({ err: toError(err) }, 'Single pass failed');
      if (!server) throw err;
    }
  }

  if (!server) {
    // Nothing left to serve
    await backend.close();
    logger.info('Done');
  }
}

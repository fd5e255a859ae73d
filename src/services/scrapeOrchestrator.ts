/**
 * Scrape Orchestrator
 *
 * Runs one scrape pass: a single browser session, one navigation, one
 * enumeration of filters, then each filter in turn. A filter that fails is
 * skipped; a navigation failure abandons the pass. Everything collected is
 * handed to the normalizer as one batch.
 */

import { logger } from '../core/logger.js';
import { ExtractionError, NavigationError, toError } from '../errors/index.js';
import type { Backend } from '../db/backend.js';
import type { CollectedLeaderboard, PassCollection, PassSummary, SkippedFilter } from '../models/pass.js';
import type { ExtractedTable, FilterOption } from '../types/leaderboard.js';
import { persistPass } from './normalizer.js';

/**
 * Browser operations a pass needs, over an opaque session type
 */
export interface ScrapeDriver<S> {
  openSession(): Promise<S>;

  /** Reaches the leaderboard document and enumerates its filters */
  navigate(session: S): Promise<FilterOption[]>;

  selectFilter(session: S, option: FilterOption): Promise<void>;
  readTable(session: S): Promise<ExtractedTable>;
  closeSession(session: S): Promise<void>;
}

export interface CollectOptions {
  /** Game label, the prefix of every leaderboard name */
  game: string;

  /** Filter labels to keep; empty keeps every enumerated filter */
  filters?: string[];
}

export interface RunPassOptions<S> extends CollectOptions {
  driver: ScrapeDriver<S>;
  backend: Backend;
}

/**
 * Name under which a filter's rows are stored
 */
export function leaderboardName(game: string, filter: string): string {
  return `${game} - ${filter}`;
}

/**
 * Collects the ranking tables of every filter in one browser session
 *
 * The pass timestamp is taken once, after the last filter has been read.
 *
 * @throws NavigationError if the leaderboard or its filters cannot be reached
 */
export async function collectPass<S>(driver: ScrapeDriver<S>, options: CollectOptions): Promise<PassCollection> {
  const session = await driver.openSession();

  try {
    const enumerated = await driver.navigate(session);
    const allow = options.filters ?? [];
    const selected = allow.length > 0 ? enumerated.filter(f => allow.includes(f.label)) : enumerated;

    if (allow.length > 0) {
      const missing = allow.filter(label => !enumerated.some(f => f.label === label));
      if (missing.length > 0) {
        logger.warn({ missing }, 'Configured filters not found on page');
      }
    }

    const leaderboards: CollectedLeaderboard[] = [];
    const skippedFilters: SkippedFilter[] = [];

    for (const option of selected) {
      try {
        await driver.selectFilter(session, option);
        const table = await driver.readTable(session);
        leaderboards.push({
          name: leaderboardName(options.game, option.label),
          filter: option.label,
          rows: table.rows,
          skippedRows: table.skippedRows
        });
      } catch (err) {
        if (err instanceof NavigationError) throw err;
        const error = toError(err);
        const kind = err instanceof ExtractionError ? 'extraction' : 'unexpected';
        logger.warn({ err: error, filter: option.label, kind }, 'Filter skipped');
        skippedFilters.push({ filter: option.label, reason: error.message });
      }
    }

    return { createdAt: new Date(), filters: selected.length, leaderboards, skippedFilters };
  } finally {
    await driver.closeSession(session);
  }
}

/**
 * Runs one complete pass: collect, then persist as a single batch
 *
 * No batch is created when no filter produced any row.
 *
 * @throws NavigationError if the pass could not reach the leaderboard
 * @throws StorageError if the batch could not be committed
 */
export async function runScrapePass<S>(options: RunPassOptions<S>): Promise<PassSummary> {
  const started = Date.now();
  const collection = await collectPass(options.driver, options);

  const base = {
    createdAt: collection.createdAt.toISOString(),
    filters: collection.filters,
    leaderboards: collection.leaderboards.map(l => ({ name: l.name, rows: l.rows.length, skippedRows: l.skippedRows })),
    skippedFilters: collection.skippedFilters,
    skippedRows: collection.leaderboards.reduce((sum, l) => sum + l.skippedRows, 0)
  };

  const rowCount = collection.leaderboards.reduce((sum, l) => sum + l.rows.length, 0);
  if (rowCount === 0) {
    const summary: PassSummary = { ...base, status: 'empty', batchId: null, factsInserted: 0, duplicateFacts: 0 };
    logger.warn({ filters: summary.filters, skippedFilters: summary.skippedFilters.length }, 'Pass collected no rows, no batch created');
    return summary;
  }

  const persisted = await persistPass(options.backend, collection);
  const summary: PassSummary = {
    ...base,
    status: 'completed',
    batchId: persisted.batchId,
    factsInserted: persisted.factsInserted,
    duplicateFacts: persisted.duplicateFacts
  };

  logger.info({
    batchId: summary.batchId,
    leaderboards: summary.leaderboards.length,
    skippedFilters: summary.skippedFilters.length,
    factsInserted: summary.factsInserted,
    durationMs: Date.now() - started
  }, 'Pass completed');
  return summary;
}

/**
 * Table Extractor
 *
 * Reads the ranking table of the currently selected filter. The table is
 * re-rendered client-side after a filter change, so rows are read only
 * once they differ from the previous filter's and two consecutive reads
 * agree.
 */

import { logger } from '../core/logger.js';
import { ExtractionError, toError } from '../errors/index.js';
import type { ExtractedTable, RawRankingRow } from '../types/leaderboard.js';
import { readRowSignature, requireFrame } from './navigator.js';
import { parseRankingRows } from './parseRanking.js';
import { COUNTRY_CELL, SELECTORS } from './selectors.js';
import type { ScrapeLocator, ScrapePage, ScrapeSession } from './session.js';

export interface ReadTableOptions {
  timeoutMs: number;

  /** Delay between two reads of the row signature */
  settleMs: number;
}

/**
 * Waits until the rows differ from `before`, or the deadline passes
 *
 * @returns true once a different, non-empty set of rows is shown
 */
async function waitForTableChange(frame: ScrapePage, before: string, deadline: number, settleMs: number): Promise<boolean> {
  for (;;) {
    const current = await readRowSignature(frame);
    if (current !== before && current !== '') return true;
    if (Date.now() >= deadline) return false;
    await frame.waitForTimeout(settleMs);
  }
}

/**
 * Waits until the table's row texts stop changing, or the deadline passes
 *
 * @returns true if two consecutive reads matched
 */
async function waitForStableRows(frame: ScrapePage, deadline: number, settleMs: number): Promise<boolean> {
  let previous = await readRowSignature(frame);

  while (Date.now() < deadline) {
    await frame.waitForTimeout(settleMs);
    const current = await readRowSignature(frame);
    if (current === previous && current !== '') return true;
    previous = current;
  }
  return false;
}

/**
 * Reads a country from a flag image in the country cell, if there is one
 */
async function readFlag(cell: ScrapeLocator, timeoutMs: number): Promise<string | null> {
  const img = cell.locator(SELECTORS.flagImage);
  if ((await img.count()) === 0) return null;
  const flag = img.first();
  const title = await flag.getAttribute('title', { timeout: timeoutMs });
  if (title?.trim()) return title.trim();
  const alt = await flag.getAttribute('alt', { timeout: timeoutMs });
  return alt?.trim() || null;
}

/**
 * Reads the cell texts of every row of the ranking table
 */
async function readRawRows(rows: ScrapeLocator, timeoutMs: number): Promise<RawRankingRow[]> {
  const count = await rows.count();
  const raw: RawRankingRow[] = [];

  for (let i = 0; i < count; i++) {
    const cellLocator = rows.nth(i).locator(SELECTORS.rankingCell);
    const cells = await cellLocator.allTextContents();
    const country = cells.length > COUNTRY_CELL && cells[COUNTRY_CELL].trim() === ''
      ? await readFlag(cellLocator.nth(COUNTRY_CELL), timeoutMs)
      : null;
    raw.push({ cells, country });
  }

  return raw;
}

/**
 * Reads and parses the ranking table shown for the session's current filter
 *
 * @throws ExtractionError if the table never appears, still shows the
 * previous filter's rows at the deadline, or cannot be read
 */
export async function readRankingTable(session: ScrapeSession, options: ReadTableOptions): Promise<ExtractedTable> {
  const frame = requireFrame(session);
  const filter = session.currentFilter ?? '';
  const deadline = Date.now() + options.timeoutMs;

  let raw: RawRankingRow[];
  try {
    const body = frame.locator(SELECTORS.rankingBody).first();
    await body.waitFor({ state: 'attached', timeout: options.timeoutMs });

    const before = session.tableSignature;
    if (before !== null) {
      const changed = await waitForTableChange(frame, before, deadline, options.settleMs);
      if (!changed) {
        throw new Error(`table did not change within ${options.timeoutMs}ms of selecting the filter`);
      }
      session.tableSignature = null;
    }

    const stable = await waitForStableRows(frame, deadline, options.settleMs);
    if (!stable) {
      logger.warn({ filter, timeoutMs: options.timeoutMs }, 'Ranking table did not settle, reading current rows');
    }

    raw = await readRawRows(body.locator(SELECTORS.rankingRow), options.timeoutMs);
  } catch (err) {
    const error = toError(err);
    throw new ExtractionError(`Failed to read ranking table for ${filter}: ${error.message}`, filter, error);
  }

  const table = parseRankingRows(raw, { filter });
  logger.info({ filter, rows: table.rows.length, skippedRows: table.skippedRows }, 'Ranking table read');
  return table;
}

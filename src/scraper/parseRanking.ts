/**
 * Ranking Row Parser
 *
 * Turns the raw cell texts of the ranking table into typed rows.
 * Cell layout: [rank, player, country, points, ...].
 */

import { logger } from '../core/logger.js';
import type { ExtractedTable, RankingRow, RawRankingRow } from '../types/leaderboard.js';

const MIN_CELLS = 4;

/**
 * Parses a points cell
 *
 * Whitespace, currency symbols and unit suffixes are ignored. When both
 * `,` and `.` appear the later one is the decimal separator. A lone
 * separator followed by exactly three digits, or any separator repeated,
 * is a thousands separator; otherwise a lone separator is the decimal
 * point.
 *
 * @returns The numeric value, or null when no number can be read
 *
 * @example
 * parsePoints('1,181.00') // 1181
 * parsePoints('1.234,5')  // 1234.5
 * parsePoints('12,345')   // 12345
 * parsePoints('1.234')    // 1234
 * parsePoints('181.50')   // 181.5
 * parsePoints('N/A')      // null
 */
export function parsePoints(text: string): number | null {
  let s = text.replace(/[^\d.,-]/g, '');
  if (!/\d/.test(s)) return null;

  const negative = s.startsWith('-');
  s = s.replace(/-/g, '');

  const lastComma = s.lastIndexOf(',');
  const lastDot = s.lastIndexOf('.');

  if (lastComma >= 0 && lastDot >= 0) {
    const decimal = lastComma > lastDot ? ',' : '.';
    const thousands = decimal === ',' ? '.' : ',';
    s = s.split(thousands).join('').replace(decimal, '.');
  } else if (lastComma >= 0 || lastDot >= 0) {
    const parts = s.split(lastComma >= 0 ? ',' : '.');
    s = parts.length > 2 || parts[1].length === 3 ? parts.join('') : parts.join('.');
  }

  if (!/^\d*\.?\d+$|^\d+\.$/.test(s)) return null;
  const value = Number(s);
  if (!Number.isFinite(value)) return null;
  return negative ? -value : value;
}

/**
 * Parses a rank cell, falling back to the row's 1-based position
 */
export function parseRank(text: string, fallback: number): number {
  const match = text.match(/\d+/);
  if (!match) return fallback;
  const rank = Number.parseInt(match[0], 10);
  return rank > 0 ? rank : fallback;
}

/**
 * Maps raw table rows to ranking rows, in on-page order
 *
 * Rows with too few cells, an empty name or unreadable points are skipped
 * and counted; they never fail the table.
 *
 * @param context - Log context identifying the table (e.g., the filter label)
 */
export function parseRankingRows(rawRows: RawRankingRow[], context: Record<string, unknown> = {}): ExtractedTable {
  const rows: RankingRow[] = [];
  let skippedRows = 0;

  rawRows.forEach((raw, i) => {
    const position = i + 1;
    const cells = raw.cells.map(c => c.trim());

    if (cells.length < MIN_CELLS) {
      skippedRows += 1;
      logger.warn({ ...context, row: position, cells: cells.length }, 'Row skipped: not enough cells');
      return;
    }

    const player = cells[1];
    if (!player) {
      skippedRows += 1;
      logger.warn({ ...context, row: position, raw: cells }, 'Row skipped: missing player name');
      return;
    }

    const points = parsePoints(cells[3]);
    if (points === null) {
      skippedRows += 1;
      logger.warn({ ...context, row: position, raw: cells[3] }, 'Row skipped: unreadable points');
      return;
    }

    const country = cells[2] || raw.country?.trim() || null;
    rows.push({ rank: parseRank(cells[0], position), player, country, points });
  });

  return { rows, skippedRows };
}

/**
 * Database Entity Types
 *
 * TypeScript interfaces matching database schema, plus readers that pull
 * typed values out of normalized result rows.
 */

import type { SqlRow, SqlValue } from './backend.js';

export interface LeaderboardRow {
  id: number;
  name: string;
}

export interface PlayerRow {
  id: number;
  name: string;
  country: string | null;
}

export interface UpdateBatchRow {
  id: number;
  created_at: string; // ISO-8601
}

export interface FactRow {
  leaderboard_id: number;
  update_id: number;
  player_id: number;
  points: number;
}

/**
 * Reads a numeric column; numeric strings (PostgreSQL bigint/numeric) are converted
 *
 * @returns null for NULL or non-numeric values
 */
export function readNumber(value: SqlValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Reads a text column
 */
export function readString(value: SqlValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Reads the `id` column of the first row, if any
 */
export function firstId(rows: SqlRow[]): number | null {
  return rows.length > 0 ? readNumber(rows[0].id) : null;
}

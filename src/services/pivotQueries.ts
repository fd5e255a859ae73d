/**
 * Pivot Query Service
 *
 * Read-only views over the fact table: the wide player × timestamp pivot,
 * a single player's history, the daily top standings, and the preview
 * and change marker used by the API. Unknown leaderboards or players
 * give empty results rather than errors.
 */

import { logger } from '../core/logger.js';
import type { Backend } from '../db/backend.js';
import { getLatestBatch } from '../db/repositories/batches.js';
import { listLeaderboards } from '../db/repositories/leaderboards.js';
import { getPlayer } from '../db/repositories/players.js';
import { readNumber, readString } from '../db/types.js';
import { sha256 } from '../util/hash.js';

/**
 * Wide table: `columns` is ['player', ts1..tsK] oldest to newest,
 * each row is [player, points | null, ...]
 */
export interface WidePivot {
  name: string;
  columns: string[];
  rows: (string | number | null)[][];
}

export interface HistoryPoint {
  timestamp: string;
  points: number | null;
}

export interface PlayerHistory {
  player: string;
  country: string | null;
  series: HistoryPoint[];
}

export interface TopPlayerEntry {
  rank: number;
  player: string;
  day: string; // YYYY-MM-DD in the backend's local day
  points: number;
}

/**
 * Lists leaderboard names, alphabetically
 */
export async function listLeaderboardNames(backend: Backend): Promise<string[]> {
  const rows = await listLeaderboards(backend);
  return rows.map(r => r.name);
}

/**
 * Builds the wide pivot for one leaderboard
 *
 * Takes the `columns` most recent batches with facts on the leaderboard,
 * emits one row per player with at least one fact among them, sorted by
 * the newest column descending (NULLs last, then by name), capped at `limit`.
 */
export async function widePivot(
  backend: Backend,
  leaderboard: string,
  columns: number,
  limit: number
): Promise<WidePivot> {
  const batches = (await backend.latestBatches(leaderboard, columns)).reverse();
  if (batches.length === 0) {
    return { name: leaderboard, columns: ['player'], rows: [] };
  }

  const aliases = batches.map((_, i) => `c${i}`);
  const pointColumns = batches
    .map((_, i) => `MAX(CASE WHEN f.update_id = ? THEN f.points END) AS ${aliases[i]}`)
    .join(',\n      ');
  const inList = batches.map(() => '?').join(', ');
  const last = aliases[aliases.length - 1];

  const query = `
    SELECT p.name AS player,
      ${pointColumns}
    FROM facts f
    JOIN players p ON p.id = f.player_id
    JOIN leaderboards l ON l.id = f.leaderboard_id
    WHERE l.name = ? AND f.update_id IN (${inList})
    GROUP BY p.name
    ORDER BY ${backend.nullsLast(last, 'DESC')}, player ASC
    LIMIT ?
  `;

  const ids = batches.map(b => b.id);
  const rows = await backend.query(query, [...ids, leaderboard, ...ids, limit]);

  return {
    name: leaderboard,
    columns: ['player', ...batches.map(b => b.createdAt)],
    rows: rows.map(row => [
      readString(row.player),
      ...aliases.map(alias => readNumber(row[alias]))
    ])
  };
}

/**
 * Gets one player's points at every batch recorded for a leaderboard
 *
 * Batches where the player has no fact appear with `points: null`.
 *
 * @returns null if the player has no facts on the leaderboard
 */
export async function playerHistory(
  backend: Backend,
  leaderboard: string,
  player: string
): Promise<PlayerHistory | null> {
  const query = `
    SELECT u.id AS id, u.created_at AS created_at, pf.points AS points
    FROM update_batch u
    LEFT JOIN (
      SELECT f.update_id AS update_id, f.points AS points
      FROM facts f
      JOIN leaderboards l ON l.id = f.leaderboard_id
      JOIN players p ON p.id = f.player_id
      WHERE l.name = ? AND p.name = ?
    ) pf ON pf.update_id = u.id
    WHERE u.id IN (
      SELECT f.update_id
      FROM facts f
      JOIN leaderboards l ON l.id = f.leaderboard_id
      WHERE l.name = ?
    )
    ORDER BY u.created_at ASC, u.id ASC
  `;

  const rows = await backend.query(query, [leaderboard, player, leaderboard]);
  const series = rows.map(row => ({
    timestamp: readString(row.created_at) ?? '',
    points: readNumber(row.points)
  }));

  if (!series.some(p => p.points !== null)) {
    return null;
  }

  const stored = await getPlayer(backend, player);
  return { player, country: stored?.country ?? null, series };
}

/**
 * Ranks the best daily scores on a leaderboard
 *
 * Facts are grouped per player per day bucket (see `Backend.dayBucket`);
 * each group keeps its maximum points, then the top `limit` groups are
 * returned by points descending.
 */
export async function topPlayers(
  backend: Backend,
  leaderboard: string,
  limit: number
): Promise<TopPlayerEntry[]> {
  const day = backend.dayBucket('u.created_at');
  const query = `
    SELECT p.name AS player, ${day} AS day, MAX(f.points) AS points
    FROM facts f
    JOIN players p ON p.id = f.player_id
    JOIN leaderboards l ON l.id = f.leaderboard_id
    JOIN update_batch u ON u.id = f.update_id
    WHERE l.name = ?
    GROUP BY p.name, ${day}
    ORDER BY points DESC, day DESC, player ASC
    LIMIT ?
  `;

  const rows = await backend.query(query, [leaderboard, limit]);
  return rows.map((row, i) => ({
    rank: i + 1,
    player: readString(row.player) ?? '',
    day: readString(row.day) ?? '',
    points: readNumber(row.points) ?? 0
  }));
}

/**
 * Wide pivot of every leaderboard, for the overview page
 */
export async function previewAll(backend: Backend, columns: number, limit: number): Promise<WidePivot[]> {
  const names = await listLeaderboardNames(backend);
  const previews: WidePivot[] = [];
  for (const name of names) {
    previews.push(await widePivot(backend, name, columns, limit));
  }
  logger.debug({ leaderboards: names.length }, 'Preview built');
  return previews;
}

/**
 * Marker that changes whenever a new batch commits
 *
 * @returns "0" before the first batch, otherwise a SHA-256 hex digest
 */
export async function lastUpdateMarker(backend: Backend): Promise<string> {
  const latest = await getLatestBatch(backend);
  if (!latest) return '0';
  return sha256(`${latest.batch.id}|${latest.batch.created_at}|${latest.facts}`);
}

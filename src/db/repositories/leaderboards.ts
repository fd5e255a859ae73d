/**
 * Leaderboard Repository
 *
 * Leaderboards are identified by name and created on first sighting.
 */

import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { Queryable } from '../backend.js';
import { firstId, readNumber, readString, type LeaderboardRow } from '../types.js';

/**
 * Resolves a leaderboard id by name, creating the row if absent
 *
 * Safe to repeat: the unique constraint on name turns a concurrent or
 * repeated insert into a no-op, and the id is read back afterwards.
 */
export async function ensureLeaderboard(q: Queryable, name: string): Promise<number> {
  try {
    const insert = await q.execute(
      'INSERT INTO leaderboards (name) VALUES (?) ON CONFLICT (name) DO NOTHING',
      [name]
    );
    const id = firstId(await q.query('SELECT id FROM leaderboards WHERE name = ?', [name]));
    if (id === null) {
      throw new Error(`Leaderboard ${name} missing after insert`);
    }
    if (insert.rowsAffected > 0) {
      logger.info({ leaderboard: name, id }, 'Leaderboard created');
    }
    return id;
  } catch (err) {
    const error = toError(err);
    throw new DatabaseError(`Failed to resolve leaderboard: ${error.message}`, 'ensureLeaderboard', error);
  }
}

/**
 * Gets all leaderboards, alphabetically
 */
export async function listLeaderboards(q: Queryable): Promise<LeaderboardRow[]> {
  const rows = await q.query('SELECT id, name FROM leaderboards ORDER BY name ASC');
  return rows.map(row => ({
    id: readNumber(row.id) ?? 0,
    name: readString(row.name) ?? ''
  }));
}

/**
 * Fact Repository
 *
 * Facts are inserted once per (leaderboard, player, batch) and never
 * updated or deleted.
 */

import type { Queryable } from '../backend.js';
import type { FactRow } from '../types.js';

/**
 * Inserts a fact unless its natural key already exists
 *
 * @returns true if inserted, false if duplicate
 */
export async function insertFact(q: Queryable, fact: FactRow): Promise<boolean> {
  const query = `
    INSERT INTO facts (leaderboard_id, update_id, player_id, points)
    VALUES (?, ?, ?, ?)
    ON CONFLICT (leaderboard_id, player_id, update_id) DO NOTHING
  `;

  const result = await q.execute(query, [
    fact.leaderboard_id,
    fact.update_id,
    fact.player_id,
    fact.points
  ]);
  return result.rowsAffected > 0;
}

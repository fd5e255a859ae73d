/**
 * Player Repository
 *
 * Players are identified by name. Country is filled in on a later
 * sighting when it was unknown, and never overwritten once set.
 */

import { DatabaseError, toError } from '../../errors/index.js';
import type { Queryable } from '../backend.js';
import { firstId, readNumber, readString, type PlayerRow } from '../types.js';

/**
 * Resolves a player id by name, creating the row if absent
 */
export async function ensurePlayer(q: Queryable, name: string, country: string | null): Promise<number> {
  const query = `
    INSERT INTO players (name, country)
    VALUES (?, ?)
    ON CONFLICT (name) DO UPDATE SET
      country = excluded.country
    WHERE players.country IS NULL AND excluded.country IS NOT NULL
  `;

  try {
    await q.execute(query, [name, country]);
    const id = firstId(await q.query('SELECT id FROM players WHERE name = ?', [name]));
    if (id === null) {
      throw new Error(`Player ${name} missing after insert`);
    }
    return id;
  } catch (err) {
    const error = toError(err);
    throw new DatabaseError(`Failed to resolve player: ${error.message}`, 'ensurePlayer', error);
  }
}

/**
 * Gets a player by exact name
 */
export async function getPlayer(q: Queryable, name: string): Promise<PlayerRow | null> {
  const rows = await q.query('SELECT id, name, country FROM players WHERE name = ?', [name]);
  if (rows.length === 0) return null;
  return {
    id: readNumber(rows[0].id) ?? 0,
    name: readString(rows[0].name) ?? name,
    country: readString(rows[0].country)
  };
}

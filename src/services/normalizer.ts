/**
 * Normalization & Upsert Service
 *
 * Maps one pass collection onto leaderboards, players, one update batch
 * and its facts. The whole pass is written in a single transaction: the
 * batch row and all of its facts commit together or not at all.
 */

import { logger } from '../core/logger.js';
import { StorageError, toError } from '../errors/index.js';
import type { Backend } from '../db/backend.js';
import { createBatch } from '../db/repositories/batches.js';
import { ensureLeaderboard } from '../db/repositories/leaderboards.js';
import { ensurePlayer } from '../db/repositories/players.js';
import { insertFact } from '../db/repositories/facts.js';
import type { PassCollection, PersistResult } from '../models/pass.js';

/**
 * Persists a pass collection as one batch
 *
 * Players are resolved once per name within the pass (again only to offer
 * a country not seen before); a name seen twice in one leaderboard yields
 * one fact and counts one duplicate.
 *
 * @throws StorageError if anything fails; nothing from the pass is kept
 */
export async function persistPass(backend: Backend, collection: PassCollection): Promise<PersistResult> {
  try {
    const result = await backend.transaction(async (tx) => {
      const batch = await createBatch(tx, collection.createdAt);
      // name -> id, and whether a country has already been offered for it
      const players = new Map<string, { id: number; countryOffered: boolean }>();
      let factsInserted = 0;
      let duplicateFacts = 0;

      for (const board of collection.leaderboards) {
        const leaderboardId = await ensureLeaderboard(tx, board.name);

        for (const row of board.rows) {
          const known = players.get(row.player);
          let playerId: number;
          if (known && (known.countryOffered || row.country === null)) {
            playerId = known.id;
          } else {
            playerId = await ensurePlayer(tx, row.player, row.country);
            players.set(row.player, { id: playerId, countryOffered: row.country !== null });
          }

          const inserted = await insertFact(tx, {
            leaderboard_id: leaderboardId,
            update_id: batch.id,
            player_id: playerId,
            points: row.points
          });

          if (inserted) {
            factsInserted += 1;
          } else {
            duplicateFacts += 1;
            logger.warn({ leaderboard: board.name, player: row.player, batchId: batch.id }, 'Duplicate fact ignored');
          }
        }

        logger.debug({ leaderboard: board.name, rows: board.rows.length }, 'Leaderboard rows staged');
      }

      return { batchId: batch.id, factsInserted, duplicateFacts };
    });

    logger.info(result, 'Batch committed');
    return result;
  } catch (err) {
    const error = toError(err);
    logger.error({ err: error }, 'Batch rolled back');
    throw new StorageError(`Failed to persist pass: ${error.message}`, 'persistPass', error);
  }
}

/**
 * Update Batch Repository
 *
 * One batch per completed pass. Batches are never updated or deleted.
 */

import { DatabaseError, toError } from '../../errors/index.js';
import type { Queryable } from '../backend.js';
import { readNumber, readString, type UpdateBatchRow } from '../types.js';

/**
 * Inserts a batch row stamped with the pass creation time
 */
export async function createBatch(q: Queryable, createdAt: Date): Promise<UpdateBatchRow> {
  try {
    const rows = await q.query(
      'INSERT INTO update_batch (created_at) VALUES (?) RETURNING id, created_at',
      [createdAt.toISOString()]
    );
    const id = rows.length > 0 ? readNumber(rows[0].id) : null;
    if (id === null) {
      throw new Error('No id returned for new batch');
    }
    return { id, created_at: readString(rows[0].created_at) ?? createdAt.toISOString() };
  } catch (err) {
    const error = toError(err);
    throw new DatabaseError(`Failed to create batch: ${error.message}`, 'createBatch', error);
  }
}

/**
 * Gets the most recent batch with its fact count
 */
export async function getLatestBatch(q: Queryable): Promise<{ batch: UpdateBatchRow; facts: number } | null> {
  const query = `
    SELECT u.id AS id, u.created_at AS created_at,
      (SELECT COUNT(*) FROM facts f WHERE f.update_id = u.id) AS facts
    FROM update_batch u
    ORDER BY u.created_at DESC, u.id DESC
    LIMIT 1
  `;
  const rows = await q.query(query);
  if (rows.length === 0) return null;

  const id = readNumber(rows[0].id);
  const createdAt = readString(rows[0].created_at);
  if (id === null || createdAt === null) return null;

  return { batch: { id, created_at: createdAt }, facts: readNumber(rows[0].facts) ?? 0 };
}

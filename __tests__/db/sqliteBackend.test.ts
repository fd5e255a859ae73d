import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sqliteUrl } from '../../src/db/sqliteBackend.js';
import { runMigrations } from '../../src/db/migrate.js';
import { createBatch, getLatestBatch } from '../../src/db/repositories/batches.js';
import { ensureLeaderboard, listLeaderboards } from '../../src/db/repositories/leaderboards.js';
import { ensurePlayer, getPlayer } from '../../src/db/repositories/players.js';
import { insertFact } from '../../src/db/repositories/facts.js';
import { DatabaseError } from '../../src/errors/index.js';
import { at, createTestBackend, type TestBackend } from '../helpers/testBackend.js';

describe('sqliteUrl', () => {
  it('should prefix file paths', () => {
    expect(sqliteUrl('leaderboards.db')).toBe('file:leaderboards.db');
    expect(sqliteUrl('/var/data/lb.db')).toBe('file:/var/data/lb.db');
  });

  it('should pass through memory and URLs', () => {
    expect(sqliteUrl(':memory:')).toBe(':memory:');
    expect(sqliteUrl('file:already.db')).toBe('file:already.db');
  });
});

describe('SqliteBackend', () => {
  let ctx: TestBackend;

  beforeEach(async () => {
    ctx = await createTestBackend();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  it('should answer ping', async () => {
    await expect(ctx.backend.ping()).resolves.toBeUndefined();
  });

  it('should rerun migrations without error', async () => {
    await expect(runMigrations(ctx.backend)).resolves.toBeUndefined();
  });

  it('should wrap script failures in DatabaseError', async () => {
    await expect(ctx.backend.runScript('CREATE TABLE')).rejects.toBeInstanceOf(DatabaseError);
  });

  it('should create leaderboards once', async () => {
    const first = await ensureLeaderboard(ctx.backend, 'PLO - $0.01/$0.02');
    const second = await ensureLeaderboard(ctx.backend, 'PLO - $0.01/$0.02');
    expect(second).toBe(first);
    expect(await listLeaderboards(ctx.backend)).toEqual([{ id: first, name: 'PLO - $0.01/$0.02' }]);
  });

  it('should fill in a missing country but never overwrite one', async () => {
    const id = await ensurePlayer(ctx.backend, 'alice', null);
    expect(await ensurePlayer(ctx.backend, 'alice', 'SE')).toBe(id);
    await ensurePlayer(ctx.backend, 'alice', 'NO');
    await ensurePlayer(ctx.backend, 'alice', null);
    expect(await getPlayer(ctx.backend, 'alice')).toEqual({ id, name: 'alice', country: 'SE' });
  });

  it('should return null for unknown players', async () => {
    expect(await getPlayer(ctx.backend, 'nobody')).toBeNull();
  });

  it('should ignore duplicate facts', async () => {
    const batch = await createBatch(ctx.backend, at(10));
    const leaderboardId = await ensureLeaderboard(ctx.backend, 'PLO - $0.01/$0.02');
    const playerId = await ensurePlayer(ctx.backend, 'bob', null);
    const fact = { leaderboard_id: leaderboardId, update_id: batch.id, player_id: playerId, points: 12.5 };

    expect(await insertFact(ctx.backend, fact)).toBe(true);
    expect(await insertFact(ctx.backend, { ...fact, points: 99 })).toBe(false);

    const rows = await ctx.backend.query('SELECT points FROM facts');
    expect(rows).toEqual([{ points: 12.5 }]);
  });

  it('should store batch timestamps as ISO strings', async () => {
    const batch = await createBatch(ctx.backend, at(10, 30));
    expect(batch.created_at).toBe('2025-03-01T10:30:00.000Z');
    expect(await getLatestBatch(ctx.backend)).toEqual({ batch, facts: 0 });
  });

  it('should commit transactions', async () => {
    await ctx.backend.transaction(async (tx) => {
      await tx.execute('INSERT INTO update_batch (created_at) VALUES (?)', ['2025-03-01T10:00:00.000Z']);
    });
    expect(await ctx.backend.query('SELECT COUNT(*) AS n FROM update_batch')).toEqual([{ n: 1 }]);
  });

  it('should roll back transactions that throw', async () => {
    await expect(ctx.backend.transaction(async (tx) => {
      await tx.execute('INSERT INTO update_batch (created_at) VALUES (?)', ['2025-03-01T10:00:00.000Z']);
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await ctx.backend.query('SELECT COUNT(*) AS n FROM update_batch')).toEqual([{ n: 0 }]);
  });

  it('should sort NULLs last in both directions', async () => {
    const sql = `
      SELECT v FROM (SELECT 2 AS v UNION ALL SELECT NULL UNION ALL SELECT 1) t
      ORDER BY ${ctx.backend.nullsLast('v', 'DESC')}
    `;
    expect(await ctx.backend.query(sql)).toEqual([{ v: 2 }, { v: 1 }, { v: null }]);

    const asc = sql.replace('DESC', 'ASC');
    expect(await ctx.backend.query(asc)).toEqual([{ v: 1 }, { v: 2 }, { v: null }]);
  });

  it('should return latest batches with facts for a leaderboard, newest first', async () => {
    const leaderboardId = await ensureLeaderboard(ctx.backend, 'PLO - $0.01/$0.02');
    const other = await ensureLeaderboard(ctx.backend, 'PLO - $0.02/$0.05');
    const playerId = await ensurePlayer(ctx.backend, 'carol', null);

    const b1 = await createBatch(ctx.backend, at(10));
    const b2 = await createBatch(ctx.backend, at(11));
    const b3 = await createBatch(ctx.backend, at(12));
    await insertFact(ctx.backend, { leaderboard_id: leaderboardId, update_id: b1.id, player_id: playerId, points: 1 });
    await insertFact(ctx.backend, { leaderboard_id: other, update_id: b2.id, player_id: playerId, points: 2 });
    await insertFact(ctx.backend, { leaderboard_id: leaderboardId, update_id: b3.id, player_id: playerId, points: 3 });

    expect(await ctx.backend.latestBatches('PLO - $0.01/$0.02', 10)).toEqual([
      { id: b3.id, createdAt: '2025-03-01T12:00:00.000Z' },
      { id: b1.id, createdAt: '2025-03-01T10:00:00.000Z' }
    ]);
    expect(await ctx.backend.latestBatches('PLO - $0.01/$0.02', 1)).toEqual([
      { id: b3.id, createdAt: '2025-03-01T12:00:00.000Z' }
    ]);
    expect(await ctx.backend.latestBatches('unknown', 10)).toEqual([]);
  });
});

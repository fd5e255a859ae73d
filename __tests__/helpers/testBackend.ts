import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SqliteBackend } from '../../src/db/sqliteBackend.js';
import { runMigrations } from '../../src/db/migrate.js';
import type { PassCollection } from '../../src/models/pass.js';

export interface TestBackend {
  backend: SqliteBackend;
  cleanup(): Promise<void>;
}

/**
 * Migrated SQLite backend on a fresh temporary file
 */
export async function createTestBackend(): Promise<TestBackend> {
  const dir = mkdtempSync(join(tmpdir(), 'leaderboards-'));
  const backend = new SqliteBackend(join(dir, 'test.db'));
  await runMigrations(backend);

  return {
    backend,
    cleanup: async () => {
      await backend.close();
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

/** [player, points, country?] */
export type TestRow = [string, number, string?];

/**
 * Builds a pass collection from leaderboard name -> rows
 */
export function passOf(createdAt: Date, boards: Record<string, TestRow[]>): PassCollection {
  const leaderboards = Object.entries(boards).map(([name, rows]) => ({
    name,
    filter: name,
    rows: rows.map(([player, points, country], i) => ({
      rank: i + 1,
      player,
      points,
      country: country ?? null
    })),
    skippedRows: 0
  }));

  return { createdAt, filters: leaderboards.length, leaderboards, skippedFilters: [] };
}

/**
 * UTC instant helper: hour offsets from 2025-03-01T00:00Z
 */
export function at(hours: number, minutes = 0): Date {
  return new Date(Date.UTC(2025, 2, 1, hours, minutes));
}

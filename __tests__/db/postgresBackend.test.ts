import { describe, it, expect, vi } from 'vitest';
import { PostgresBackend } from '../../src/db/postgresBackend.js';
import type { PgConnection, PgConnectionSource, PgResult } from '../../src/db/postgresBackend.js';
import type { SqlParam } from '../../src/db/backend.js';
import { DatabaseError } from '../../src/errors/index.js';

interface Call {
  text: string;
  values?: SqlParam[];
}

/**
 * In-process stand-in for a pg pool: records statements, answers from a queue
 */
class FakeSource implements PgConnectionSource {
  calls: Call[] = [];
  results: PgResult[] = [];
  released = 0;
  ended = false;
  failOn: string | null = null;

  async query(text: string, values?: SqlParam[]): Promise<PgResult> {
    this.calls.push({ text, values });
    if (this.failOn !== null && text.includes(this.failOn)) {
      throw new Error(`failed: ${this.failOn}`);
    }
    return this.results.shift() ?? { rows: [], rowCount: 0 };
  }

  async connect(): Promise<PgConnection> {
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released += 1;
      }
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

describe('PostgresBackend', () => {
  it('should rewrite placeholders and normalize rows', async () => {
    const source = new FakeSource();
    source.results.push({
      rows: [{ id: 3, created_at: new Date(Date.UTC(2025, 2, 1, 10)), facts: '12' }],
      rowCount: 1
    });
    const backend = new PostgresBackend(source);

    const rows = await backend.query('SELECT * FROM update_batch WHERE id = ? AND created_at > ?', [3, '2025-01-01']);

    expect(source.calls).toEqual([
      { text: 'SELECT * FROM update_batch WHERE id = $1 AND created_at > $2', values: [3, '2025-01-01'] }
    ]);
    expect(rows).toEqual([{ id: 3, created_at: '2025-03-01T10:00:00.000Z', facts: '12' }]);
  });

  it('should report affected rows', async () => {
    const source = new FakeSource();
    source.results.push({ rows: [], rowCount: 2 }, { rows: [], rowCount: null });
    const backend = new PostgresBackend(source);

    expect(await backend.execute('DELETE FROM t')).toEqual({ rowsAffected: 2 });
    expect(await backend.execute('SET x = 1')).toEqual({ rowsAffected: 0 });
  });

  it('should wrap transactions in BEGIN and COMMIT', async () => {
    const source = new FakeSource();
    const backend = new PostgresBackend(source);

    const result = await backend.transaction(async (tx) => {
      await tx.execute('INSERT INTO update_batch (created_at) VALUES (?)', ['2025-03-01T10:00:00.000Z']);
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(source.calls.map(c => c.text)).toEqual([
      'BEGIN',
      'INSERT INTO update_batch (created_at) VALUES ($1)',
      'COMMIT'
    ]);
    expect(source.released).toBe(1);
  });

  it('should roll back and release when the transaction throws', async () => {
    const source = new FakeSource();
    source.failOn = 'INSERT';
    const backend = new PostgresBackend(source);

    await expect(backend.transaction(async (tx) => {
      await tx.execute('INSERT INTO facts VALUES (?)', [1]);
    })).rejects.toThrow('failed: INSERT');

    expect(source.calls.map(c => c.text)).toEqual(['BEGIN', 'INSERT INTO facts VALUES ($1)', 'ROLLBACK']);
    expect(source.released).toBe(1);
  });

  it('should use native NULLS LAST and a day bucket', () => {
    const backend = new PostgresBackend(new FakeSource());
    expect(backend.nullsLast('c3', 'DESC')).toBe('c3 DESC NULLS LAST');
    expect(backend.dayBucket('u.created_at')).toBe("to_char(date_trunc('day', u.created_at), 'YYYY-MM-DD')");
  });

  it('should map latest batches', async () => {
    const source = new FakeSource();
    source.results.push({
      rows: [
        { id: 9, created_at: new Date(Date.UTC(2025, 2, 1, 12)) },
        { id: 4, created_at: new Date(Date.UTC(2025, 2, 1, 11)) }
      ],
      rowCount: 2
    });
    const backend = new PostgresBackend(source);

    const batches = await backend.latestBatches('PLO - $0.01/$0.02', 2);

    expect(batches).toEqual([
      { id: 9, createdAt: '2025-03-01T12:00:00.000Z' },
      { id: 4, createdAt: '2025-03-01T11:00:00.000Z' }
    ]);
    expect(source.calls[0].values).toEqual(['PLO - $0.01/$0.02', 2]);
    expect(source.calls[0].text).toContain('LIMIT $2');
  });

  it('should run scripts unbound and wrap failures', async () => {
    const source = new FakeSource();
    const backend = new PostgresBackend(source);

    await backend.runScript('CREATE TABLE a (id INT); CREATE TABLE b (id INT);');
    expect(source.calls[0]).toEqual({ text: 'CREATE TABLE a (id INT); CREATE TABLE b (id INT);', values: undefined });

    source.failOn = 'DROP';
    await expect(backend.runScript('DROP TABLE a')).rejects.toBeInstanceOf(DatabaseError);
  });

  it('should end the pool on close', async () => {
    const source = new FakeSource();
    const end = vi.spyOn(source, 'end');
    await new PostgresBackend(source).close();
    expect(end).toHaveBeenCalledOnce();
    expect(source.ended).toBe(true);
  });
});

/**
 * PostgreSQL Backend
 *
 * Client-server store through a `pg` connection pool.
 * Statements arrive with `?` placeholders and are rewritten to `$n`;
 * PostgreSQL supports NULLS LAST natively.
 */

import { Pool } from 'pg';
import { logger } from '../core/logger.js';
import { DatabaseError, toError } from '../errors/index.js';
import {
  LATEST_BATCHES_SQL,
  toBatchRefs,
  toNumberedPlaceholders,
  toSqlValue,
  type Backend,
  type BatchRef,
  type ExecuteResult,
  type Queryable,
  type SortDirection,
  type SqlParam,
  type SqlRow
} from './backend.js';

/**
 * Raw result of one statement
 */
export interface PgResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/**
 * A checked-out connection
 */
export interface PgConnection {
  query(text: string, values?: SqlParam[]): Promise<PgResult>;
  release(): void;
}

/**
 * Where connections come from (a pool in production, a fake in tests)
 */
export interface PgConnectionSource {
  query(text: string, values?: SqlParam[]): Promise<PgResult>;
  connect(): Promise<PgConnection>;
  end(): Promise<void>;
}

export interface PostgresOptions {
  connectionString: string;
  ssl: false | { rejectUnauthorized: boolean };
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * Adapts a `pg` pool into a connection source
 */
export function poolSource(options: PostgresOptions): PgConnectionSource {
  const pool = new Pool(options);

  // Log connection events for monitoring
  pool.on('error', (err: Error) => {
    logger.error({ err }, 'Database pool error');
  });

  return {
    query: async (text, values) => {
      const res = await pool.query(text, values);
      return { rows: res.rows, rowCount: res.rowCount };
    },
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, values) => {
          const res = await client.query(text, values);
          return { rows: res.rows, rowCount: res.rowCount };
        },
        release: () => client.release()
      };
    },
    end: () => pool.end()
  };
}

function normalizeRows(rows: Record<string, unknown>[]): SqlRow[] {
  return rows.map(row => {
    const out: SqlRow = {};
    for (const [column, value] of Object.entries(row)) {
      out[column] = toSqlValue(value);
    }
    return out;
  });
}

type Runner = Pick<PgConnectionSource, 'query'>;

function wrap(runner: Runner): Queryable {
  return {
    query: async (sql, params = []) => {
      const res = await runner.query(toNumberedPlaceholders(sql), params);
      return normalizeRows(res.rows);
    },
    execute: async (sql, params = []) => {
      const res = await runner.query(toNumberedPlaceholders(sql), params);
      return { rowsAffected: res.rowCount ?? 0 };
    }
  };
}

export class PostgresBackend implements Backend {
  readonly kind = 'postgres' as const;
  private readonly runner: Queryable;

  constructor(private readonly source: PgConnectionSource) {
    this.runner = wrap(source);
  }

  query(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    return this.runner.query(sql, params);
  }

  execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return this.runner.execute(sql, params);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.source.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(wrap(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        logger.error({ err: rollbackErr }, 'PostgreSQL rollback failed');
      }
      throw err;
    } finally {
      client.release();
    }
  }

  nullsLast(expr: string, direction: SortDirection): string {
    return `${expr} ${direction} NULLS LAST`;
  }

  dayBucket(expr: string): string {
    return `to_char(date_trunc('day', ${expr}), 'YYYY-MM-DD')`;
  }

  async latestBatches(leaderboard: string, limit: number): Promise<BatchRef[]> {
    const rows = await this.query(LATEST_BATCHES_SQL, [leaderboard, limit]);
    return toBatchRefs(rows);
  }

  async runScript(sql: string): Promise<void> {
    try {
      // Simple-query protocol accepts several statements when no values are bound
      await this.source.query(sql);
    } catch (err) {
      const error = toError(err);
      throw new DatabaseError(`Failed to run script: ${error.message}`, 'runScript', error);
    }
  }

  async ping(): Promise<void> {
    await this.source.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.source.end();
    logger.info('Database connections closed');
  }
}

/**
 * SQLite Backend
 *
 * Embedded file-based store through the libSQL client.
 * SQLite takes `?` placeholders natively; NULLS LAST ordering is emulated
 * with an `IS NULL` sort key.
 */

import { createClient, type Client, type InStatement, type InValue, type ResultSet } from '@libsql/client';
import { logger } from '../core/logger.js';
import { DatabaseError, toError } from '../errors/index.js';
import {
  LATEST_BATCHES_SQL,
  toBatchRefs,
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
 * The part of a libSQL client or transaction the helpers below need
 */
interface Executor {
  execute(stmt: InStatement): Promise<ResultSet>;
}

/**
 * Turns a file path into a libSQL URL (`:memory:` and URLs pass through)
 */
export function sqliteUrl(path: string): string {
  if (path === ':memory:' || /^[a-z]+:/i.test(path)) return path;
  return `file:${path}`;
}

async function runQuery(exec: Executor, sql: string, params: SqlParam[]): Promise<SqlRow[]> {
  const args: InValue[] = params;
  const rs = await exec.execute({ sql, args });
  return rs.rows.map(row => {
    const out: SqlRow = {};
    rs.columns.forEach((column, i) => {
      out[column] = toSqlValue(row[i]);
    });
    return out;
  });
}

async function runExecute(exec: Executor, sql: string, params: SqlParam[]): Promise<ExecuteResult> {
  const args: InValue[] = params;
  const rs = await exec.execute({ sql, args });
  return { rowsAffected: rs.rowsAffected };
}

function wrap(exec: Executor): Queryable {
  return {
    query: (sql, params = []) => runQuery(exec, sql, params),
    execute: (sql, params = []) => runExecute(exec, sql, params)
  };
}

export class SqliteBackend implements Backend {
  readonly kind = 'sqlite' as const;
  private readonly client: Client;

  constructor(path: string) {
    this.client = createClient({ url: sqliteUrl(path) });
    logger.debug({ path }, 'SQLite backend created');
  }

  query(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    return runQuery(this.client, sql, params);
  }

  execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    return runExecute(this.client, sql, params);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const tx = await this.client.transaction('write');
    try {
      const result = await fn(wrap(tx));
      await tx.commit();
      return result;
    } catch (err) {
      try {
        await tx.rollback();
      } catch (rollbackErr) {
        logger.error({ err: rollbackErr }, 'SQLite rollback failed');
      }
      throw err;
    } finally {
      tx.close();
    }
  }

  nullsLast(expr: string, direction: SortDirection): string {
    // (expr IS NULL) is 0 for values and 1 for NULL, so ASC puts NULLs after
    return `(${expr} IS NULL) ASC, ${expr} ${direction}`;
  }

  dayBucket(expr: string): string {
    return `date(${expr}, 'localtime')`;
  }

  async latestBatches(leaderboard: string, limit: number): Promise<BatchRef[]> {
    const rows = await this.query(LATEST_BATCHES_SQL, [leaderboard, limit]);
    return toBatchRefs(rows);
  }

  async runScript(sql: string): Promise<void> {
    try {
      await this.client.executeMultiple(sql);
    } catch (err) {
      const error = toError(err);
      throw new DatabaseError(`Failed to run script: ${error.message}`, 'runScript', error);
    }
  }

  async ping(): Promise<void> {
    await this.client.execute('SELECT 1');
  }

  async close(): Promise<void> {
    this.client.close();
    logger.info('SQLite backend closed');
  }
}

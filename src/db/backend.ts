/**
 * Backend Abstraction
 *
 * One query/execute interface over the embedded SQLite store and the
 * PostgreSQL server. Repositories and queries write SQL with `?`
 * placeholders and call the dialect hooks (`nullsLast`, `dayBucket`)
 * instead of checking which backend they run on.
 */

export type BackendKind = 'sqlite' | 'postgres';

/** Values accepted as query parameters */
export type SqlParam = string | number | null;

/** Values returned in result rows (timestamps are ISO-8601 strings) */
export type SqlValue = string | number | null;

export type SqlRow = Record<string, SqlValue>;

export type SortDirection = 'ASC' | 'DESC';

export interface ExecuteResult {
  rowsAffected: number;
}

/**
 * A batch (pass) that has at least one fact on a leaderboard
 */
export interface BatchRef {
  id: number;
  createdAt: string;
}

/**
 * Statement runner shared by the backend and its transactions
 */
export interface Queryable {
  query(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
}

/**
 * Storage backend
 */
export interface Backend extends Queryable {
  readonly kind: BackendKind;

  /**
   * Runs `fn` inside BEGIN/COMMIT; any throw rolls everything back and is rethrown
   */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;

  /**
   * ORDER BY fragment sorting `expr` in `direction` with NULLs after every value
   */
  nullsLast(expr: string, direction: SortDirection): string;

  /**
   * SQL expression mapping a batch timestamp to its calendar day (YYYY-MM-DD)
   *
   * The cutoff is backend-local: session time zone on PostgreSQL,
   * process time zone on SQLite.
   */
  dayBucket(expr: string): string;

  /**
   * The `limit` most recent batches holding facts for `leaderboard`, newest first
   */
  latestBatches(leaderboard: string, limit: number): Promise<BatchRef[]>;

  /** Executes a multi-statement script (migrations) */
  runScript(sql: string): Promise<void>;

  /** Round-trips a trivial statement; throws when the backend is unreachable */
  ping(): Promise<void>;

  close(): Promise<void>;
}

/**
 * Shared statement for `latestBatches`, identical on both dialects
 */
export const LATEST_BATCHES_SQL = `
  SELECT u.id AS id, u.created_at AS created_at
  FROM update_batch u
  WHERE u.id IN (
    SELECT f.update_id
    FROM facts f
    JOIN leaderboards l ON l.id = f.leaderboard_id
    WHERE l.name = ?
  )
  ORDER BY u.created_at DESC, u.id DESC
  LIMIT ?
`;

/**
 * Rewrites `?` placeholders into PostgreSQL's `$1..$n`
 *
 * Question marks inside single-quoted literals or double-quoted
 * identifiers are left alone.
 *
 * @example
 * toNumberedPlaceholders("SELECT * FROM t WHERE a = ? AND b = '?'")
 * // Returns: "SELECT * FROM t WHERE a = $1 AND b = '?'"
 */
export function toNumberedPlaceholders(sql: string): string {
  let out = '';
  let n = 0;
  let quote: "'" | '"' | null = null;

  for (const ch of sql) {
    if (quote) {
      if (ch === quote) quote = null;
      out += ch;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
    } else if (ch === '?') {
      n += 1;
      out += `$${n}`;
    } else {
      out += ch;
    }
  }

  return out;
}

/**
 * Normalizes a driver value into a row value
 *
 * Dates become ISO strings, bigints and booleans numbers; binary blobs
 * and anything else are stringified.
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Maps `latestBatches` rows into batch references
 */
export function toBatchRefs(rows: SqlRow[]): BatchRef[] {
  return rows.map(row => ({
    id: Number(row.id),
    createdAt: String(row.created_at)
  }));
}

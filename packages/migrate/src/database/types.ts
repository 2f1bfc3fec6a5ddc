/**
 * @fileoverview Database Types
 *
 * The narrow surface the migration engine consumes from SQLite.
 */

/**
 * A value that can be bound to, or read from, a SQLite statement.
 */
export type SqlValue = null | number | bigint | string | Buffer;

export type SqlParams = readonly SqlValue[] | Readonly<Record<string, SqlValue>>;

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Synchronous SQL execution surface used by schemas, executors and
 * version stores. Rows come back as `unknown` and are validated by callers.
 */
export interface SqlDatabase {
  /** Execute one or more statements without parameters */
  exec(sql: string): void;
  /** Run a single statement and report affected rows */
  run(sql: string, params?: SqlParams): RunResult;
  /** First row of a query, or undefined */
  get(sql: string, params?: SqlParams): unknown;
  /** All rows of a query */
  all(sql: string, params?: SqlParams): unknown[];
  /**
   * Run `fn` inside a transaction. When a transaction is already open the
   * work is scoped to a savepoint instead.
   */
  transaction<T>(fn: () => T): T;
  /** Whether a transaction is currently open */
  readonly inTransaction: boolean;
}

export interface DatabaseConfig {
  /** File path, or ':memory:' */
  dbPath: string;
  enableWAL: boolean;
  busyTimeout: number;
  /** Page cache size in KB */
  cacheSize: number;
  foreignKeys: boolean;
  readonly?: boolean;
}

/**
 * @fileoverview SQLite Database Connection Management
 *
 * Handles database connection lifecycle, configuration, and pragma setup,
 * and adapts better-sqlite3 to the SqlDatabase surface.
 */

import Database from 'better-sqlite3';
import { getSettings } from '../settings/index.js';
import type { DatabaseConfig, RunResult, SqlDatabase, SqlParams, SqlValue } from './types.js';

export const DEFAULT_CONFIG = {
  cacheSize: 64000, // 64MB
  foreignKeys: true,
} as const;

/**
 * Adapts an open better-sqlite3 handle to SqlDatabase.
 */
export class BetterSqliteDatabase implements SqlDatabase {
  constructor(private readonly db: Database.Database) {}

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  get raw(): Database.Database {
    return this.db;
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  run(sql: string, params?: SqlParams): RunResult {
    const stmt = this.db.prepare(sql);
    const result = params === undefined ? stmt.run() : bind(params, (...args) => stmt.run(...args));
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
  }

  get(sql: string, params?: SqlParams): unknown {
    const stmt = this.db.prepare(sql);
    return params === undefined ? stmt.get() : bind(params, (...args) => stmt.get(...args));
  }

  all(sql: string, params?: SqlParams): unknown[] {
    const stmt = this.db.prepare(sql);
    return params === undefined ? stmt.all() : bind(params, (...args) => stmt.all(...args));
  }

  /**
   * better-sqlite3 transactions are synchronous and turn into savepoints
   * when nested.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}

function bind<R>(params: SqlParams, call: (...args: unknown[]) => R): R {
  return isPositional(params) ? call(...params) : call(params);
}

function isPositional(params: SqlParams): params is readonly SqlValue[] {
  return Array.isArray(params);
}

export function wrapDatabase(db: Database.Database): BetterSqliteDatabase {
  return new BetterSqliteDatabase(db);
}

/**
 * Manages SQLite database connection lifecycle
 */
export class DatabaseConnection {
  private db: Database.Database | null = null;
  private wrapped: BetterSqliteDatabase | null = null;
  private readonly config: DatabaseConfig;

  constructor(dbPath: string, config?: Partial<Omit<DatabaseConfig, 'dbPath'>>) {
    const settings = getSettings();
    this.config = {
      dbPath,
      enableWAL: config?.enableWAL ?? settings.enableWAL,
      busyTimeout: config?.busyTimeout ?? settings.busyTimeoutMs,
      cacheSize: config?.cacheSize ?? DEFAULT_CONFIG.cacheSize,
      foreignKeys: config?.foreignKeys ?? DEFAULT_CONFIG.foreignKeys,
      readonly: config?.readonly ?? false,
    };
  }

  /**
   * Open the database connection and configure pragmas
   */
  open(): BetterSqliteDatabase {
    if (this.wrapped) {
      return this.wrapped;
    }

    const db = new Database(this.config.dbPath, { readonly: this.config.readonly });
    this.configurePragmas(db);
    this.db = db;
    this.wrapped = new BetterSqliteDatabase(db);
    return this.wrapped;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.wrapped = null;
    }
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  /**
   * @throws Error if the connection hasn't been opened
   */
  getDatabase(): BetterSqliteDatabase {
    if (!this.wrapped) {
      throw new Error('Database not open. Call open() first.');
    }
    return this.wrapped;
  }

  getConfig(): DatabaseConfig {
    return { ...this.config };
  }

  private configurePragmas(db: Database.Database): void {
    const { enableWAL, busyTimeout, cacheSize, foreignKeys, dbPath } = this.config;

    // WAL has no effect on in-memory databases
    if (enableWAL && dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }

    db.pragma(`busy_timeout = ${busyTimeout}`);
    db.pragma(`foreign_keys = ${foreignKeys ? 'ON' : 'OFF'}`);
    db.pragma('synchronous = NORMAL');

    // Negative = KB, positive = pages
    db.pragma(`cache_size = -${cacheSize}`);
  }
}

/**
 * Open an in-memory database with foreign keys enabled.
 */
export function openMemoryDatabase(): BetterSqliteDatabase {
  return new DatabaseConnection(':memory:').open();
}

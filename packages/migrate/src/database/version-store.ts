/**
 * @fileoverview Persisted schema version
 *
 * A VersionStore reads and writes the single integer recording which
 * declared version a database is at. Two strategies ship:
 *
 * - TableVersionStore: one row per schema identifier in a `schema_version`
 *   table, so several schemas can share one database file
 * - UserVersionStore: SQLite's `PRAGMA user_version` header field
 */

import { z } from 'zod';
import { MigrationPreconditionError } from '../errors.js';
import { tableExists } from './inspect.js';
import { escapeIdentifier } from './sql.js';
import type { SqlDatabase } from './types.js';

export interface VersionStore {
  /**
   * The stored version. 0 when nothing was ever written; null when a value
   * is stored but is not a non-negative integer.
   */
  read(db: SqlDatabase): number | null;
  write(db: SqlDatabase, version: number): void;
  /** Tables the store owns, which a reset must leave in place */
  readonly reservedTables: readonly string[];
}

function assertStorableVersion(version: number): void {
  if (!Number.isInteger(version) || version < 0) {
    throw new MigrationPreconditionError(`Invalid schema version to store: ${version}`);
  }
}

function asVersion(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

// =============================================================================
// schema_version table
// =============================================================================

const versionRow = z.object({ version: z.unknown() });

export class TableVersionStore implements VersionStore {
  readonly reservedTables: readonly string[];

  constructor(
    readonly identifier: string,
    readonly tableName = 'schema_version'
  ) {
    this.reservedTables = [tableName];
  }

  read(db: SqlDatabase): number | null {
    if (!tableExists(db, this.tableName)) {
      return 0;
    }
    const row = db.get(`SELECT version FROM ${escapeIdentifier(this.tableName)} WHERE identifier = ?`, [
      this.identifier,
    ]);
    if (row === undefined) {
      return 0;
    }
    return asVersion(versionRow.parse(row).version);
  }

  write(db: SqlDatabase, version: number): void {
    assertStorableVersion(version);
    const table = escapeIdentifier(this.tableName);
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        identifier TEXT PRIMARY KEY,
        version INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    db.run(`INSERT OR REPLACE INTO ${table} (identifier, version, updated_at) VALUES (?, ?, datetime('now'))`, [
      this.identifier,
      version,
    ]);
  }
}

// =============================================================================
// PRAGMA user_version
// =============================================================================

const userVersionRow = z.object({ user_version: z.number() });

export class UserVersionStore implements VersionStore {
  readonly reservedTables: readonly string[] = [];

  read(db: SqlDatabase): number | null {
    return asVersion(userVersionRow.parse(db.get('PRAGMA user_version')).user_version);
  }

  write(db: SqlDatabase, version: number): void {
    assertStorableVersion(version);
    db.exec(`PRAGMA user_version = ${version}`);
  }
}

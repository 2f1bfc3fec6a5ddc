/**
 * @fileoverview Schema inspection
 *
 * Reads what actually exists in a SQLite database. Rows coming back from
 * sqlite_master and the pragmas are validated with zod before use.
 */

import { z } from 'zod';
import type { ForeignKeyViolation } from '../errors.js';
import { escapeIdentifier } from './sql.js';
import type { SqlDatabase } from './types.js';

// =============================================================================
// Row Schemas
// =============================================================================

const schemaEntryRow = z.object({
  type: z.enum(['table', 'index', 'view', 'trigger']),
  name: z.string(),
  tbl_name: z.string(),
  sql: z.string().nullable(),
});

const tableInfoRow = z.object({
  cid: z.number(),
  name: z.string(),
  type: z.string(),
  notnull: z.number(),
  dflt_value: z.string().nullable(),
  pk: z.number(),
});

const indexInfoRow = z.object({
  seqno: z.number(),
  cid: z.number(),
  name: z.string().nullable(),
});

const indexListRow = z.object({
  name: z.string(),
  unique: z.number(),
  origin: z.string(),
  partial: z.number(),
});

const foreignKeyCheckRow = z.object({
  table: z.string(),
  rowid: z.number().nullable(),
  parent: z.string(),
  fkid: z.number(),
});

// =============================================================================
// Types
// =============================================================================

export type SchemaEntryType = z.infer<typeof schemaEntryRow>['type'];

export interface SchemaEntry {
  type: SchemaEntryType;
  name: string;
  tableName: string;
  sql: string | null;
}

export interface ColumnInfo {
  name: string;
  /** Declared type as written, '' when untyped */
  type: string;
  notNull: boolean;
  defaultValue: string | null;
  /** 1-based position in the primary key, 0 when not part of it */
  primaryKey: number;
}

export interface IndexDetails {
  name: string;
  tableName: string;
  columns: string[];
  unique: boolean;
  partial: boolean;
  sql: string | null;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Everything in sqlite_master except SQLite's own objects.
 */
export function listSchemaEntries(db: SqlDatabase): SchemaEntry[] {
  const rows = db.all(
    "SELECT type, name, tbl_name, sql FROM sqlite_master WHERE name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY rowid"
  );
  return z
    .array(schemaEntryRow)
    .parse(rows)
    .map((row) => ({ type: row.type, name: row.name, tableName: row.tbl_name, sql: row.sql }));
}

export function listTableNames(db: SqlDatabase): string[] {
  return listSchemaEntries(db)
    .filter((entry) => entry.type === 'table')
    .map((entry) => entry.name);
}

/**
 * Explicitly created indexes, optionally limited to one table. Automatic
 * indexes backing UNIQUE and PRIMARY KEY constraints are not included.
 */
export function listIndexNames(db: SqlDatabase, tableName?: string): string[] {
  return listSchemaEntries(db)
    .filter((entry) => entry.type === 'index' && (tableName === undefined || entry.tableName === tableName))
    .map((entry) => entry.name);
}

export function tableExists(db: SqlDatabase, tableName: string): boolean {
  const row = db.get("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?", [tableName]);
  return row !== undefined;
}

export function tableColumns(db: SqlDatabase, tableName: string): ColumnInfo[] {
  const rows = db.all(`PRAGMA table_info(${escapeIdentifier(tableName)})`);
  return z
    .array(tableInfoRow)
    .parse(rows)
    .map((row) => ({
      name: row.name,
      type: row.type,
      notNull: row.notnull === 1,
      defaultValue: row.dflt_value,
      primaryKey: row.pk,
    }));
}

/**
 * Indexed column names in index order. Expression columns come back as null.
 */
export function indexColumns(db: SqlDatabase, indexName: string): Array<string | null> {
  const rows = db.all(`PRAGMA index_info(${escapeIdentifier(indexName)})`);
  return z
    .array(indexInfoRow)
    .parse(rows)
    .sort((a, b) => a.seqno - b.seqno)
    .map((row) => row.name);
}

export function indexDetails(db: SqlDatabase, indexName: string): IndexDetails | undefined {
  const entry = listSchemaEntries(db).find((e) => e.type === 'index' && e.name === indexName);
  if (!entry) return undefined;

  const listed = z
    .array(indexListRow)
    .parse(db.all(`PRAGMA index_list(${escapeIdentifier(entry.tableName)})`))
    .find((row) => row.name === indexName);

  return {
    name: entry.name,
    tableName: entry.tableName,
    columns: indexColumns(db, indexName).filter((name): name is string => name !== null),
    unique: listed?.unique === 1,
    partial: listed?.partial === 1,
    sql: entry.sql,
  };
}

/**
 * Foreign key violations, for one table or for the whole database.
 */
export function foreignKeyViolations(db: SqlDatabase, tableName?: string): ForeignKeyViolation[] {
  const sql =
    tableName === undefined ? 'PRAGMA foreign_key_check' : `PRAGMA foreign_key_check(${escapeIdentifier(tableName)})`;
  return z.array(foreignKeyCheckRow).parse(db.all(sql));
}

/**
 * Current value of PRAGMA foreign_keys.
 */
export function foreignKeysEnabled(db: SqlDatabase): boolean {
  const row = z.object({ foreign_keys: z.number() }).parse(db.get('PRAGMA foreign_keys'));
  return row.foreign_keys === 1;
}

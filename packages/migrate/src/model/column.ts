/**
 * @fileoverview Column model
 */

import { escapeIdentifier } from '../database/sql.js';

/**
 * Declared column types. `Untyped` declares no type at all, which gives the
 * column SQLite's BLOB ("none") affinity.
 */
export const ColumnType = {
  Integer: 'INTEGER',
  Real: 'REAL',
  Text: 'TEXT',
  Blob: 'BLOB',
  Untyped: '',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

export interface Column {
  readonly name: string;
  readonly type: ColumnType;
  /** Raw constraint clauses in declaration order, e.g. 'NOT NULL', "DEFAULT ''" */
  readonly constraints: readonly string[];
}

export function createColumn(name: string, type: ColumnType, constraints: readonly string[] = []): Column {
  return Object.freeze({ name, type, constraints: Object.freeze([...constraints]) });
}

/**
 * The column's SQL definition as used in CREATE TABLE and ADD COLUMN.
 */
export function columnDefinition(column: Column): string {
  const parts = [escapeIdentifier(column.name)];
  if (column.type !== ColumnType.Untyped) {
    parts.push(column.type);
  }
  parts.push(...column.constraints);
  return parts.join(' ');
}

// A DEFAULT value: parenthesized expression (one level of nesting), quoted
// literal, or a single token
const DEFAULT_PATTERN = /\bDEFAULT\s+(\((?:[^()]|\([^()]*\))*\)|'(?:[^']|'')*'|"(?:[^"]|"")*"|[^\s,]+)/i;

/**
 * The DEFAULT expression declared by the column's constraints, as written.
 */
export function columnDefaultValue(column: Column): string | undefined {
  for (const constraint of column.constraints) {
    const match = DEFAULT_PATTERN.exec(constraint);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return undefined;
}

function hasClause(column: Column, pattern: RegExp): boolean {
  return column.constraints.some((constraint) => pattern.test(constraint));
}

export function isPrimaryKeyColumn(column: Column): boolean {
  return hasClause(column, /\bPRIMARY\s+KEY\b/i);
}

export function isAutoincrementColumn(column: Column): boolean {
  return hasClause(column, /\bAUTOINCREMENT\b/i);
}

const TIME_DEFAULTS = new Set(['CURRENT_TIME', 'CURRENT_DATE', 'CURRENT_TIMESTAMP']);

/**
 * Whether the default is an expression SQLite evaluates per row.
 * `ADD COLUMN` refuses these on a table that already has rows.
 */
export function hasNonConstantDefault(column: Column): boolean {
  const value = columnDefaultValue(column);
  if (value === undefined) return false;
  return value.startsWith('(') || TIME_DEFAULTS.has(value.toUpperCase());
}

/**
 * Whether SQLite's `ALTER TABLE ... ADD COLUMN` accepts this column:
 * no PRIMARY KEY or UNIQUE, NOT NULL only with a default, a constant
 * default, and no STORED generated value.
 */
export function canAddColumnNatively(column: Column): boolean {
  if (isPrimaryKeyColumn(column) || hasClause(column, /\bUNIQUE\b/i)) {
    return false;
  }
  if (hasClause(column, /\bNOT\s+NULL\b/i) && columnDefaultValue(column) === undefined) {
    return false;
  }
  if (hasNonConstantDefault(column) || hasClause(column, /\bAS\s*\(.*\)\s*STORED\b/is)) {
    return false;
  }
  return true;
}

/**
 * @fileoverview Table model
 *
 * Tables are frozen values. Every change produces a new Table, so a
 * snapshot handed out for one version can never be altered by a later one.
 */

import { escapeIdentifier } from '../database/sql.js';
import { SchemaDeclarationError } from '../errors.js';
import { columnDefinition, isAutoincrementColumn, isPrimaryKeyColumn, type Column } from './column.js';

export interface TableConstraint {
  readonly name?: string;
  /** The constraint clause, e.g. "UNIQUE (a, b)" or "CHECK (age >= 0)" */
  readonly clause: string;
}

export interface PrimaryKey {
  readonly column: string;
  readonly autoincrement: boolean;
}

export interface Table {
  readonly name: string;
  /** Physical column order */
  readonly columns: readonly Column[];
  readonly constraints: readonly TableConstraint[];
}

/**
 * Build a table value, checking the per-table invariants.
 *
 * @throws SchemaDeclarationError on duplicate column or constraint names,
 *   or more than one primary key column
 */
export function createTable(
  name: string,
  columns: readonly Column[],
  constraints: readonly TableConstraint[] = []
): Table {
  if (columns.length === 0) {
    throw new SchemaDeclarationError(`Table '${name}' must have at least one column`);
  }

  const columnNames = new Set<string>();
  for (const column of columns) {
    if (columnNames.has(column.name)) {
      throw new SchemaDeclarationError(`Table '${name}' declares column '${column.name}' more than once`);
    }
    columnNames.add(column.name);
  }

  const constraintNames = new Set<string>();
  for (const constraint of constraints) {
    if (constraint.name === undefined) continue;
    if (constraintNames.has(constraint.name)) {
      throw new SchemaDeclarationError(`Table '${name}' declares constraint '${constraint.name}' more than once`);
    }
    constraintNames.add(constraint.name);
  }

  const primaryKeys = columns.filter(isPrimaryKeyColumn);
  if (primaryKeys.length > 1) {
    throw new SchemaDeclarationError(
      `Table '${name}' declares more than one primary key column: ${primaryKeys.map((c) => c.name).join(', ')}`
    );
  }

  return Object.freeze({
    name,
    columns: Object.freeze([...columns]),
    constraints: Object.freeze(constraints.map((c) => Object.freeze({ ...c }))),
  });
}

export function findColumn(table: Table, name: string): Column | undefined {
  return table.columns.find((c) => c.name === name);
}

export function primaryKey(table: Table): PrimaryKey | undefined {
  const column = table.columns.find(isPrimaryKeyColumn);
  if (!column) return undefined;
  return { column: column.name, autoincrement: isAutoincrementColumn(column) };
}

export function constraintDefinition(constraint: TableConstraint): string {
  return constraint.name === undefined
    ? constraint.clause
    : `CONSTRAINT ${escapeIdentifier(constraint.name)} ${constraint.clause}`;
}

/**
 * Column and table-constraint definitions, in CREATE TABLE order.
 */
export function tableDefinitions(table: Table): string[] {
  return [...table.columns.map(columnDefinition), ...table.constraints.map(constraintDefinition)];
}

export function renamedTable(table: Table, name: string): Table {
  return Object.freeze({ ...table, name });
}

export function withAddedColumn(table: Table, column: Column): Table {
  return createTable(table.name, [...table.columns, column], table.constraints);
}

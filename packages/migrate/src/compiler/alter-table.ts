/**
 * @fileoverview Alter-table compiler
 *
 * SQLite's ALTER TABLE can only append a column or rename a table. Every
 * other change (drop, rename or retype a column, change constraints, fill
 * values from an expression) rebuilds the table: create a temporary table
 * with the final structure, copy rows across with per-column source
 * expressions, drop the original, rename the copy into place and recreate
 * the surviving indexes.
 *
 * All edits of one alterTable block are folded into a single final table,
 * so a block produces either native ADD COLUMN operations or exactly one
 * rebuild, never a chain of rebuilds.
 */

import { escapeIdentifier } from '../database/sql.js';
import { SchemaDeclarationError } from '../errors.js';
import { canAddColumnNatively, createColumn, type Column, type ColumnType } from '../model/column.js';
import type { ColumnSource, Operation } from '../model/operations.js';
import {
  createTable,
  findColumn,
  withAddedColumn,
  type Table,
  type TableConstraint,
} from '../model/table.js';
import type { TableIndex } from '../model/table-index.js';
import { remapIndexes } from './index-remapper.js';

// =============================================================================
// Edits
// =============================================================================

export type TableEdit =
  | { readonly kind: 'addColumn'; readonly column: Column; readonly setValue?: string }
  | { readonly kind: 'dropColumn'; readonly name: string }
  | {
      readonly kind: 'alterColumn';
      readonly name: string;
      readonly renameTo?: string;
      readonly type?: ColumnType;
      readonly constraints?: readonly string[];
      readonly setValue?: string;
    }
  | { readonly kind: 'addConstraint'; readonly clause: string; readonly name?: string }
  | { readonly kind: 'dropConstraint'; readonly name: string }
  | { readonly kind: 'dropConstraintClause'; readonly clause: string }
  | { readonly kind: 'dropAllConstraints' };

export interface AddColumnOptions {
  /** Constraint clauses, e.g. ['NOT NULL', "DEFAULT ''"] */
  constraints?: readonly string[];
  /**
   * SQL expression computing the value for existing rows. It is evaluated
   * against the original row, so it refers to columns by their old names,
   * e.g. `coalesce(nickname, name)`.
   */
  setValue?: string;
}

export interface AlterColumnOptions {
  renameTo?: string;
  type?: ColumnType;
  /** Replaces the column's constraints entirely */
  constraints?: readonly string[];
  /** Expression, evaluated against the original row, for the new value */
  setValue?: string;
}

/**
 * DSL collecting the edits of one alterTable block, in declaration order.
 *
 * Columns are addressed by the name they had before the block; a column
 * added earlier in the same block is addressed by its new name.
 */
export class TableAlterer {
  private readonly edits: TableEdit[] = [];

  constructor(readonly tableName: string) {}

  addColumn(name: string, type: ColumnType, options: AddColumnOptions = {}): this {
    const column = createColumn(name, type, options.constraints ?? []);
    this.edits.push(
      options.setValue === undefined
        ? { kind: 'addColumn', column }
        : { kind: 'addColumn', column, setValue: options.setValue }
    );
    return this;
  }

  alterColumn(name: string, changes: AlterColumnOptions): this {
    this.edits.push({ kind: 'alterColumn', name, ...changes });
    return this;
  }

  dropColumn(name: string): this {
    this.edits.push({ kind: 'dropColumn', name });
    return this;
  }

  addConstraint(clause: string, name?: string): this {
    this.edits.push(name === undefined ? { kind: 'addConstraint', clause } : { kind: 'addConstraint', clause, name });
    return this;
  }

  /** Drop the table constraint with the given name */
  dropConstraint(name: string): this {
    this.edits.push({ kind: 'dropConstraint', name });
    return this;
  }

  /** Drop the unnamed (or named) table constraint whose clause matches exactly */
  dropConstraintClause(clause: string): this {
    this.edits.push({ kind: 'dropConstraintClause', clause });
    return this;
  }

  dropAllConstraints(): this {
    this.edits.push({ kind: 'dropAllConstraints' });
    return this;
  }

  getEdits(): readonly TableEdit[] {
    return [...this.edits];
  }
}

// =============================================================================
// Compilation
// =============================================================================

export interface AlterTableInput {
  readonly table: Table;
  /** Indexes currently defined on the table */
  readonly indexes: readonly TableIndex[];
  readonly edits: readonly TableEdit[];
  /** Whether a name is already taken by a table or index in the snapshot */
  readonly isNameTaken: (name: string) => boolean;
}

export interface AlterTableResult {
  readonly table: Table;
  /** Indexes on the table after the alteration */
  readonly indexes: readonly TableIndex[];
  readonly droppedIndexes: readonly string[];
  readonly operations: readonly Operation[];
}

interface WorkingColumn {
  column: Column;
  /** Name before the block, or null for columns added by the block */
  readonly origin: string | null;
  /** Source expression for the copy, or null to let DEFAULT apply */
  source: string | null;
}

function isNativeAdd(edit: TableEdit): edit is Extract<TableEdit, { kind: 'addColumn' }> {
  return edit.kind === 'addColumn' && edit.setValue === undefined && canAddColumnNatively(edit.column);
}

export function compileAlterTable(input: AlterTableInput): AlterTableResult {
  const { table, indexes, edits } = input;

  if (edits.every(isNativeAdd)) {
    return compileNativeAdds(table, indexes, edits.filter(isNativeAdd));
  }
  return compileRebuild(input);
}

function compileNativeAdds(
  table: Table,
  indexes: readonly TableIndex[],
  adds: ReadonlyArray<Extract<TableEdit, { kind: 'addColumn' }>>
): AlterTableResult {
  let altered = table;
  const operations: Operation[] = [];

  for (const { column } of adds) {
    if (findColumn(altered, column.name)) {
      throw new SchemaDeclarationError(
        `Unable to add column '${column.name}' to '${table.name}': column already exists`
      );
    }
    altered = withAddedColumn(altered, column);
    operations.push({ kind: 'addColumn', tableName: table.name, column });
  }

  return { table: altered, indexes, droppedIndexes: [], operations };
}

function compileRebuild(input: AlterTableInput): AlterTableResult {
  const { table, indexes, edits } = input;
  const working: WorkingColumn[] = table.columns.map((column) => ({
    column,
    origin: column.name,
    source: escapeIdentifier(column.name),
  }));
  let constraints: TableConstraint[] = [...table.constraints];

  const fail = (message: string): never => {
    throw new SchemaDeclarationError(`Unable to alter table '${table.name}': ${message}`);
  };

  const resolve = (name: string): number => {
    const byOrigin = working.findIndex((w) => w.origin === name);
    if (byOrigin >= 0) return byOrigin;
    const byName = working.findIndex((w) => w.column.name === name);
    if (byName >= 0) return byName;
    return fail(`column '${name}' doesn't exist`);
  };

  const assertNameFree = (name: string, except?: WorkingColumn): void => {
    if (working.some((w) => w !== except && w.column.name === name)) {
      fail(`column '${name}' already exists`);
    }
  };

  for (const edit of edits) {
    switch (edit.kind) {
      case 'addColumn':
        assertNameFree(edit.column.name);
        working.push({ column: edit.column, origin: null, source: edit.setValue ?? null });
        break;

      case 'dropColumn':
        working.splice(resolve(edit.name), 1);
        break;

      case 'alterColumn': {
        const entry = working[resolve(edit.name)];
        if (!entry) break;
        const current = entry.column;
        if (edit.renameTo !== undefined) {
          assertNameFree(edit.renameTo, entry);
        }
        entry.column = createColumn(
          edit.renameTo ?? current.name,
          edit.type ?? current.type,
          edit.constraints ?? current.constraints
        );
        if (edit.setValue !== undefined) {
          entry.source = edit.setValue;
        }
        break;
      }

      case 'addConstraint':
        if (edit.name !== undefined && constraints.some((c) => c.name === edit.name)) {
          fail(`constraint '${edit.name}' already exists`);
        }
        constraints.push(edit.name === undefined ? { clause: edit.clause } : { name: edit.name, clause: edit.clause });
        break;

      case 'dropConstraint': {
        const at = constraints.findIndex((c) => c.name === edit.name);
        if (at < 0) fail(`constraint '${edit.name}' not found`);
        constraints.splice(at, 1);
        break;
      }

      case 'dropConstraintClause': {
        const at = constraints.findIndex((c) => c.clause === edit.clause);
        if (at < 0) fail(`constraint '${edit.clause}' not found`);
        constraints.splice(at, 1);
        break;
      }

      case 'dropAllConstraints':
        constraints = [];
        break;

      default: {
        const _exhaustive: never = edit;
        return _exhaustive;
      }
    }
  }

  if (working.length === 0) {
    fail('every column would be dropped');
  }

  const finalTable = createTable(
    table.name,
    working.map((w) => w.column),
    constraints
  );

  const columnMap = new Map<string, string>();
  const columnPlan: ColumnSource[] = [];
  for (const w of working) {
    if (w.origin !== null) {
      columnMap.set(w.origin, w.column.name);
    }
    if (w.source !== null) {
      columnPlan.push({ column: w.column.name, expression: w.source });
    }
  }

  const remapped = remapIndexes(indexes, columnMap);

  return {
    table: finalTable,
    indexes: remapped.indexes,
    droppedIndexes: remapped.dropped,
    operations: [
      {
        kind: 'rebuildTable',
        originalName: table.name,
        temporaryName: temporaryTableName(table.name, input.isNameTaken),
        table: finalTable,
        columnPlan,
        indexesToRecreate: remapped.indexes,
        droppedIndexes: remapped.dropped,
      },
    ],
  };
}

/**
 * `<table>__rebuild`, or `<table>__rebuild_<n>` when that name is taken.
 */
export function temporaryTableName(tableName: string, isNameTaken: (name: string) => boolean): string {
  const base = `${tableName}__rebuild`;
  if (!isNameTaken(base)) return base;
  let suffix = 2;
  while (isNameTaken(`${base}_${suffix}`)) {
    suffix += 1;
  }
  return `${base}_${suffix}`;
}

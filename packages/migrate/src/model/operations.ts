/**
 * @fileoverview Migration operations
 *
 * Operations are the only thing the executor understands. The version DSL
 * and the alter-table compiler exist to produce them.
 */

import type { SqlDatabase } from '../database/types.js';
import type { Column } from './column.js';
import type { Table } from './table.js';
import type { TableIndex } from './table-index.js';

export type ExecuteCallback = (db: SqlDatabase) => void;

export interface CreateTableOperation {
  readonly kind: 'createTable';
  readonly table: Table;
}

export interface DropTableOperation {
  readonly kind: 'dropTable';
  readonly name: string;
  readonly ifExists: boolean;
}

export interface RenameTableOperation {
  readonly kind: 'renameTable';
  readonly from: string;
  readonly to: string;
  /**
   * Indexes on the table after the rename. SQLite moves indexes with their
   * table, so these carry no SQL; they keep the model consistent.
   */
  readonly indexes: readonly TableIndex[];
}

/** Native `ALTER TABLE ... ADD COLUMN` */
export interface AddColumnOperation {
  readonly kind: 'addColumn';
  readonly tableName: string;
  readonly column: Column;
}

export interface ColumnSource {
  /** Column in the rebuilt table */
  readonly column: string;
  /** SQL expression evaluated against the original row */
  readonly expression: string;
}

/**
 * Create-temp, copy, drop-original, rename-into-place, recreate-indexes.
 * Executed as one unit so indexes are recreated once, after the rename.
 */
export interface RebuildTableOperation {
  readonly kind: 'rebuildTable';
  readonly originalName: string;
  readonly temporaryName: string;
  readonly table: Table;
  /**
   * Copied columns with their source expressions. Columns absent from the
   * plan are filled by their DEFAULT (or NULL).
   */
  readonly columnPlan: readonly ColumnSource[];
  readonly indexesToRecreate: readonly TableIndex[];
  /** Indexes removed because they covered a dropped column */
  readonly droppedIndexes: readonly string[];
}

export interface CreateIndexOperation {
  readonly kind: 'createIndex';
  readonly index: TableIndex;
  readonly ifNotExists: boolean;
}

export interface DropIndexOperation {
  readonly kind: 'dropIndex';
  readonly name: string;
  readonly ifExists: boolean;
}

/** Executed as drop + create under the new name */
export interface RenameIndexOperation {
  readonly kind: 'renameIndex';
  readonly from: string;
  readonly index: TableIndex;
}

export interface ExecuteOperation {
  readonly kind: 'execute';
  readonly callback: ExecuteCallback;
  readonly description?: string;
}

export type Operation =
  | CreateTableOperation
  | DropTableOperation
  | RenameTableOperation
  | AddColumnOperation
  | RebuildTableOperation
  | CreateIndexOperation
  | DropIndexOperation
  | RenameIndexOperation
  | ExecuteOperation;

export type OperationKind = Operation['kind'];

/**
 * The table or index an operation acts on, for diagnostics.
 */
export function operationTarget(operation: Operation): string | undefined {
  switch (operation.kind) {
    case 'createTable':
      return operation.table.name;
    case 'dropTable':
    case 'dropIndex':
      return operation.name;
    case 'renameTable':
      return operation.from;
    case 'addColumn':
      return operation.tableName;
    case 'rebuildTable':
      return operation.originalName;
    case 'createIndex':
      return operation.index.name;
    case 'renameIndex':
      return operation.from;
    case 'execute':
      return operation.description;
    default: {
      const _exhaustive: never = operation;
      return _exhaustive;
    }
  }
}

/**
 * @fileoverview Operation SQL generation
 *
 * Turns operations into the statements the executor runs, and into the
 * readable plan returned by `Schema.plan`.
 */

import {
  addColumnSql,
  copyRowsSql,
  createIndexSql,
  createTableSql,
  dropIndexSql,
  dropTableSql,
  renameTableSql,
} from '../database/sql.js';
import { columnDefinition } from '../model/column.js';
import type { Operation } from '../model/operations.js';
import { tableDefinitions } from '../model/table.js';
import type { TableIndex } from '../model/table-index.js';

function indexSql(index: TableIndex, ifNotExists = false): string {
  return createIndexSql(index.name, index.tableName, index.columns, {
    unique: index.unique,
    ifNotExists,
    ...(index.where !== undefined ? { where: index.where } : {}),
  });
}

export class OperationSqlGenerator {
  /**
   * Statements for one operation, in execution order. Execute operations
   * have none.
   */
  statements(operation: Operation): string[] {
    switch (operation.kind) {
      case 'createTable':
        return [createTableSql(operation.table.name, tableDefinitions(operation.table))];

      case 'dropTable':
        return [dropTableSql(operation.name, operation.ifExists)];

      case 'renameTable':
        return [renameTableSql(operation.from, operation.to)];

      case 'addColumn':
        return [addColumnSql(operation.tableName, columnDefinition(operation.column))];

      case 'rebuildTable': {
        const { originalName, temporaryName, table, columnPlan } = operation;
        const statements = [createTableSql(temporaryName, tableDefinitions(table))];
        if (columnPlan.length > 0) {
          statements.push(
            copyRowsSql(
              temporaryName,
              originalName,
              columnPlan.map((source) => source.column),
              columnPlan.map((source) => source.expression)
            )
          );
        }
        statements.push(dropTableSql(originalName), renameTableSql(temporaryName, originalName));
        statements.push(...operation.indexesToRecreate.map((index) => indexSql(index)));
        return statements;
      }

      case 'createIndex':
        return [indexSql(operation.index, operation.ifNotExists)];

      case 'dropIndex':
        return [dropIndexSql(operation.name, operation.ifExists)];

      case 'renameIndex':
        return [dropIndexSql(operation.from), indexSql(operation.index)];

      case 'execute':
        return [];

      default: {
        const _exhaustive: never = operation;
        return _exhaustive;
      }
    }
  }

  /**
   * Statements for a plan listing. Execute operations show as a comment.
   */
  describe(operation: Operation): string[] {
    if (operation.kind === 'execute') {
      return [`-- execute: ${operation.description ?? 'custom step'}`];
    }
    return this.statements(operation);
  }
}

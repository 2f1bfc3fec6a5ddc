/**
 * @fileoverview Table builder
 *
 * DSL used inside `createTable` blocks.
 */

import { SchemaDeclarationError } from '../errors.js';
import { ColumnType, createColumn, type Column } from '../model/column.js';
import { createTable, type Table, type TableConstraint } from '../model/table.js';

export interface PrimaryKeyOptions {
  /** Defaults to INTEGER, which makes the column an alias of the rowid */
  type?: ColumnType;
  autoincrement?: boolean;
}

export class TableBuilder {
  private readonly columns: Column[] = [];
  private readonly constraints: TableConstraint[] = [];

  constructor(readonly tableName: string) {}

  primaryKey(name: string, options: PrimaryKeyOptions = {}): this {
    const type = options.type ?? ColumnType.Integer;
    if (options.autoincrement && type !== ColumnType.Integer) {
      throw new SchemaDeclarationError(
        `Table '${this.tableName}': AUTOINCREMENT requires an INTEGER primary key, '${name}' is ${type || 'untyped'}`
      );
    }
    const constraints = options.autoincrement ? ['PRIMARY KEY', 'AUTOINCREMENT'] : ['PRIMARY KEY'];
    return this.column(name, type, ...constraints);
  }

  /**
   * Declare a column, e.g. `t.column('email', ColumnType.Text, 'NOT NULL', 'UNIQUE')`.
   */
  column(name: string, type: ColumnType, ...constraints: string[]): this {
    this.columns.push(createColumn(name, type, constraints));
    return this;
  }

  /**
   * Declare a table constraint, e.g. `t.constraint('UNIQUE (a, b)', 'ab_unique')`.
   */
  constraint(clause: string, name?: string): this {
    this.constraints.push(name === undefined ? { clause } : { name, clause });
    return this;
  }

  build(): Table {
    return createTable(this.tableName, this.columns, this.constraints);
  }
}

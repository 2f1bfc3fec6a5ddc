/**
 * @fileoverview Schema snapshot
 *
 * The full set of tables and indexes as they exist at one declared version.
 */

import type { Table } from './table.js';
import type { TableIndex } from './table-index.js';

export class SchemaSnapshot {
  static readonly empty = new SchemaSnapshot(new Map(), new Map());

  private readonly tables: ReadonlyMap<string, Table>;
  private readonly indexes: ReadonlyMap<string, TableIndex>;

  constructor(tables: ReadonlyMap<string, Table>, indexes: ReadonlyMap<string, TableIndex>) {
    this.tables = new Map(tables);
    this.indexes = new Map(indexes);
  }

  /** Table names in creation order */
  get tableNames(): string[] {
    return [...this.tables.keys()];
  }

  /** Index names in creation order */
  get indexNames(): string[] {
    return [...this.indexes.keys()];
  }

  table(name: string): Table | undefined {
    return this.tables.get(name);
  }

  index(name: string): TableIndex | undefined {
    return this.indexes.get(name);
  }

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  hasIndex(name: string): boolean {
    return this.indexes.has(name);
  }

  allTables(): Table[] {
    return [...this.tables.values()];
  }

  allIndexes(): TableIndex[] {
    return [...this.indexes.values()];
  }

  indexesOn(tableName: string): TableIndex[] {
    return this.allIndexes().filter((index) => index.tableName === tableName);
  }
}

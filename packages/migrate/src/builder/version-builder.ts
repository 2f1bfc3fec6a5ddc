/**
 * @fileoverview Version builder
 *
 * The DSL a version block is written against. Each call validates itself
 * against the working copy of the schema, updates it, and appends the
 * operations that carry the change out. The block's final working copy
 * becomes the version's snapshot.
 */

import { SchemaDeclarationError } from '../errors.js';
import { compileAlterTable, TableAlterer } from '../compiler/alter-table.js';
import { retargetIndexes } from '../compiler/index-remapper.js';
import type { ExecuteCallback, Operation } from '../model/operations.js';
import { SchemaSnapshot } from '../model/snapshot.js';
import { findColumn, renamedTable, type Table } from '../model/table.js';
import { createIndex, renamedIndex, type IndexDefinition, type TableIndex } from '../model/table-index.js';
import { TableBuilder } from './table-builder.js';

export interface DropOptions {
  /** Accept a name that doesn't exist in the snapshot (and emit IF EXISTS) */
  ifExists?: boolean;
}

export interface BuiltVersion {
  readonly snapshot: SchemaSnapshot;
  readonly operations: readonly Operation[];
}

export class VersionBuilder {
  private readonly tables: Map<string, Table>;
  private readonly indexes: Map<string, TableIndex>;
  private readonly operations: Operation[] = [];

  constructor(
    readonly versionNumber: number,
    previous: SchemaSnapshot = SchemaSnapshot.empty
  ) {
    this.tables = new Map(previous.allTables().map((table) => [table.name, table]));
    this.indexes = new Map(previous.allIndexes().map((index) => [index.name, index]));
  }

  // ===========================================================================
  // Tables
  // ===========================================================================

  createTable(name: string, block: (table: TableBuilder) => void): this {
    this.assertNameFree(name);
    const builder = new TableBuilder(name);
    block(builder);
    const table = builder.build();

    this.tables.set(name, table);
    this.operations.push({ kind: 'createTable', table });
    return this;
  }

  dropTable(name: string, options: DropOptions = {}): this {
    if (!this.tables.has(name)) {
      if (!options.ifExists) {
        throw new SchemaDeclarationError(`Unable to drop table '${name}': table doesn't exist`);
      }
      this.operations.push({ kind: 'dropTable', name, ifExists: true });
      return this;
    }

    for (const index of this.indexesOn(name)) {
      this.indexes.delete(index.name);
      this.operations.push({ kind: 'dropIndex', name: index.name, ifExists: true });
    }
    this.tables.delete(name);
    this.operations.push({ kind: 'dropTable', name, ifExists: options.ifExists ?? false });
    return this;
  }

  renameTable(from: string, to: string): this {
    const table = this.requireTable(from, 'rename');
    if (from === to) {
      throw new SchemaDeclarationError(`Unable to rename table '${from}': new name is the same`);
    }
    this.assertNameFree(to);

    const indexes = retargetIndexes(this.indexesOn(from), to);
    this.tables.delete(from);
    this.tables.set(to, renamedTable(table, to));
    for (const index of indexes) {
      this.indexes.set(index.name, index);
    }
    this.operations.push({ kind: 'renameTable', from, to, indexes });
    return this;
  }

  /**
   * Collect the edits of `block` and compile them into native ADD COLUMN
   * operations, or a single table rebuild.
   */
  alterTable(name: string, block: (table: TableAlterer) => void): this {
    const table = this.requireTable(name, 'alter');
    const alterer = new TableAlterer(name);
    block(alterer);

    const result = compileAlterTable({
      table,
      indexes: this.indexesOn(name),
      edits: alterer.getEdits(),
      isNameTaken: (candidate) => this.tables.has(candidate) || this.indexes.has(candidate),
    });

    this.tables.set(name, result.table);
    for (const dropped of result.droppedIndexes) {
      this.indexes.delete(dropped);
    }
    for (const index of result.indexes) {
      this.indexes.set(index.name, index);
    }
    this.operations.push(...result.operations);
    return this;
  }

  // ===========================================================================
  // Indexes
  // ===========================================================================

  createIndex(name: string, tableName: string, definition: IndexDefinition | readonly string[]): this {
    const table = this.requireTable(tableName, 'create an index on');
    this.assertNameFree(name);

    const normalized: IndexDefinition = isColumnList(definition) ? { columns: definition } : definition;
    if (normalized.columns.length === 0) {
      throw new SchemaDeclarationError(`Index '${name}' on '${tableName}' must cover at least one column`);
    }
    for (const column of normalized.columns) {
      if (!findColumn(table, column)) {
        throw new SchemaDeclarationError(
          `Unable to create index '${name}': column '${column}' doesn't exist in table '${tableName}'`
        );
      }
    }

    const index = createIndex(name, tableName, normalized);
    this.indexes.set(name, index);
    this.operations.push({ kind: 'createIndex', index, ifNotExists: false });
    return this;
  }

  dropIndex(name: string, options: DropOptions = {}): this {
    if (!this.indexes.delete(name) && !options.ifExists) {
      throw new SchemaDeclarationError(`Unable to drop index '${name}': index doesn't exist`);
    }
    this.operations.push({ kind: 'dropIndex', name, ifExists: options.ifExists ?? false });
    return this;
  }

  renameIndex(from: string, to: string): this {
    const index = this.indexes.get(from);
    if (!index) {
      throw new SchemaDeclarationError(`Unable to rename index '${from}': index doesn't exist`);
    }
    if (from === to) {
      throw new SchemaDeclarationError(`Unable to rename index '${from}': new name is the same`);
    }
    this.assertNameFree(to);

    const renamed = renamedIndex(index, to);
    this.indexes.delete(from);
    this.indexes.set(to, renamed);
    this.operations.push({ kind: 'renameIndex', from, index: renamed });
    return this;
  }

  // ===========================================================================
  // Data
  // ===========================================================================

  /**
   * Run arbitrary synchronous work inside the migration transaction, in
   * order with the surrounding operations. Does not change the snapshot.
   */
  execute(callback: ExecuteCallback, description?: string): this {
    this.operations.push(
      description === undefined ? { kind: 'execute', callback } : { kind: 'execute', callback, description }
    );
    return this;
  }

  build(): BuiltVersion {
    return {
      snapshot: new SchemaSnapshot(this.tables, this.indexes),
      operations: [...this.operations],
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private requireTable(name: string, action: string): Table {
    const table = this.tables.get(name);
    if (!table) {
      throw new SchemaDeclarationError(`Unable to ${action} table '${name}': table doesn't exist`);
    }
    return table;
  }

  /** Tables and indexes share SQLite's schema namespace */
  private assertNameFree(name: string): void {
    if (this.tables.has(name)) {
      throw new SchemaDeclarationError(`A table named '${name}' already exists`);
    }
    if (this.indexes.has(name)) {
      throw new SchemaDeclarationError(`An index named '${name}' already exists`);
    }
  }

  private indexesOn(tableName: string): TableIndex[] {
    return [...this.indexes.values()].filter((index) => index.tableName === tableName);
  }
}

function isColumnList(definition: IndexDefinition | readonly string[]): definition is readonly string[] {
  return Array.isArray(definition);
}

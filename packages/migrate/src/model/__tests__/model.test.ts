/**
 * @fileoverview Tests for the column, table and index model
 */

import { describe, it, expect } from 'vitest';
import {
  ColumnType,
  canAddColumnNatively,
  columnDefaultValue,
  columnDefinition,
  createColumn,
} from '../column.js';
import { createTable, primaryKey, renamedTable, tableDefinitions, withAddedColumn } from '../table.js';
import { createIndex, renamedIndex, withColumns } from '../table-index.js';
import { SchemaSnapshot } from '../snapshot.js';
import { operationTarget } from '../operations.js';
import { SchemaDeclarationError } from '../../errors.js';

describe('Column', () => {
  it('should render definitions', () => {
    expect(columnDefinition(createColumn('name', ColumnType.Text, ['NOT NULL']))).toBe('"name" TEXT NOT NULL');
    expect(columnDefinition(createColumn('anything', ColumnType.Untyped))).toBe('"anything"');
  });

  it('should parse DEFAULT values out of constraints', () => {
    expect(columnDefaultValue(createColumn('a', ColumnType.Integer, ['NOT NULL', 'DEFAULT 0']))).toBe('0');
    expect(columnDefaultValue(createColumn('b', ColumnType.Text, ["DEFAULT 'it''s'"]))).toBe("'it''s'");
    expect(columnDefaultValue(createColumn('c', ColumnType.Text, ['DEFAULT (datetime())']))).toBe('(datetime())');
    expect(columnDefaultValue(createColumn('d', ColumnType.Text))).toBeUndefined();
  });

  it('should follow SQLite ADD COLUMN rules', () => {
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text))).toBe(true);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['NOT NULL', "DEFAULT ''"]))).toBe(true);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['NOT NULL']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['UNIQUE']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Integer, ['PRIMARY KEY']))).toBe(false);
  });

  it('should keep columns with per-row defaults off the ADD COLUMN path', () => {
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['DEFAULT CURRENT_TIMESTAMP']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['default current_date']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ['DEFAULT (datetime())']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Integer, ['AS (id * 2) STORED']))).toBe(false);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Text, ["DEFAULT 'CURRENT_TIMESTAMP'"]))).toBe(true);
    expect(canAddColumnNatively(createColumn('a', ColumnType.Integer, ['DEFAULT -1']))).toBe(true);
  });
});

describe('Table', () => {
  const id = createColumn('id', ColumnType.Integer, ['PRIMARY KEY', 'AUTOINCREMENT']);
  const name = createColumn('name', ColumnType.Text, ['NOT NULL']);

  it('should render column and constraint definitions in order', () => {
    const table = createTable('people', [id, name], [{ clause: 'CHECK (length(name) > 0)', name: 'name_present' }]);
    expect(tableDefinitions(table)).toEqual([
      '"id" INTEGER PRIMARY KEY AUTOINCREMENT',
      '"name" TEXT NOT NULL',
      'CONSTRAINT "name_present" CHECK (length(name) > 0)',
    ]);
    expect(primaryKey(table)).toEqual({ column: 'id', autoincrement: true });
  });

  it('should reject duplicate columns', () => {
    expect(() => createTable('people', [name, name])).toThrow(
      "Table 'people' declares column 'name' more than once"
    );
  });

  it('should reject duplicate constraint names', () => {
    expect(() =>
      createTable('t', [name], [
        { name: 'c', clause: 'CHECK (1)' },
        { name: 'c', clause: 'CHECK (2)' },
      ])
    ).toThrow(SchemaDeclarationError);
  });

  it('should reject a second primary key', () => {
    expect(() =>
      createTable('t', [id, createColumn('other', ColumnType.Integer, ['PRIMARY KEY'])])
    ).toThrow("Table 't' declares more than one primary key column: id, other");
  });

  it('should reject an empty table', () => {
    expect(() => createTable('t', [])).toThrow("Table 't' must have at least one column");
  });

  it('should produce new values instead of mutating', () => {
    const table = createTable('people', [id]);
    const renamed = renamedTable(table, 'persons');
    const widened = withAddedColumn(table, name);

    expect(table.name).toBe('people');
    expect(table.columns).toHaveLength(1);
    expect(renamed.name).toBe('persons');
    expect(widened.columns.map((c) => c.name)).toEqual(['id', 'name']);
    expect(Object.isFrozen(table.columns)).toBe(true);
  });
});

describe('TableIndex', () => {
  it('should default to a non-unique index without predicate', () => {
    const index = createIndex('people_name', 'people', { columns: ['name'] });
    expect(index).toEqual({ name: 'people_name', tableName: 'people', columns: ['name'], unique: false });
  });

  it('should copy on rename and column rewrite', () => {
    const index = createIndex('idx', 't', { columns: ['a'], unique: true, where: 'a > 0' });
    expect(renamedIndex(index, 'idx2')).toEqual({ ...index, name: 'idx2' });
    expect(withColumns(index, ['b']).columns).toEqual(['b']);
    expect(index.columns).toEqual(['a']);
  });
});

describe('SchemaSnapshot', () => {
  it('should look up tables and indexes in creation order', () => {
    const people = createTable('people', [createColumn('id', ColumnType.Integer)]);
    const pets = createTable('pets', [createColumn('owner', ColumnType.Integer)]);
    const index = createIndex('pets_owner', 'pets', { columns: ['owner'] });
    const snapshot = new SchemaSnapshot(
      new Map([
        ['people', people],
        ['pets', pets],
      ]),
      new Map([['pets_owner', index]])
    );

    expect(snapshot.tableNames).toEqual(['people', 'pets']);
    expect(snapshot.indexNames).toEqual(['pets_owner']);
    expect(snapshot.table('pets')).toBe(pets);
    expect(snapshot.index('missing')).toBeUndefined();
    expect(snapshot.indexesOn('pets')).toEqual([index]);
    expect(snapshot.indexesOn('people')).toEqual([]);
    expect(SchemaSnapshot.empty.tableNames).toEqual([]);
  });
});

describe('operationTarget', () => {
  it('should name the object an operation acts on', () => {
    expect(operationTarget({ kind: 'dropTable', name: 'people', ifExists: false })).toBe('people');
    expect(operationTarget({ kind: 'renameTable', from: 'a', to: 'b', indexes: [] })).toBe('a');
    expect(operationTarget({ kind: 'execute', callback: () => undefined })).toBeUndefined();
    expect(operationTarget({ kind: 'execute', callback: () => undefined, description: 'backfill' })).toBe('backfill');
  });
});

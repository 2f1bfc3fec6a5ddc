/**
 * @fileoverview Tests for MigrationExecutor
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MigrationExecutor } from '../executor.js';
import { VersionBuilder } from '../../builder/version-builder.js';
import { openMemoryDatabase, type BetterSqliteDatabase } from '../../database/connection.js';
import { indexColumns, listIndexNames, listTableNames, tableColumns } from '../../database/inspect.js';
import { ForeignKeyViolationError, MigrationExecutionError } from '../../errors.js';
import { MigrationLogger } from '../../logging/index.js';
import { ColumnType } from '../../model/column.js';

const logger = new MigrationLogger({ level: 'fatal' });

const v1 = new VersionBuilder(1)
  .createTable('people', (t) => {
    t.primaryKey('id');
    t.column('name', ColumnType.Text, 'NOT NULL');
    t.column('age', ColumnType.Integer);
  })
  .createIndex('people_name', 'people', ['name'])
  .createIndex('people_age', 'people', ['age'])
  .build();

describe('MigrationExecutor', () => {
  let db: BetterSqliteDatabase;
  let executor: MigrationExecutor;

  beforeEach(() => {
    db = openMemoryDatabase();
    executor = new MigrationExecutor(db, { logger });
    executor.applyVersion({ number: 1, operations: v1.operations });
    db.run("INSERT INTO people (id, name, age) VALUES (1, 'Abby', 30), (2, 'Bill', NULL)");
  });

  it('should create tables and indexes', () => {
    expect(tableColumns(db, 'people').map((c) => c.name)).toEqual(['id', 'name', 'age']);
    expect(listIndexNames(db, 'people')).toEqual(['people_name', 'people_age']);
  });

  it('should rebuild a table, keeping rows and remapping indexes', () => {
    const v2 = new VersionBuilder(2, v1.snapshot)
      .alterTable('people', (t) => {
        t.alterColumn('name', { renameTo: 'full_name', setValue: 'upper(name)' });
        t.dropColumn('age');
      })
      .build();
    executor.applyVersion({ number: 2, operations: v2.operations });

    expect(db.all('SELECT id, full_name FROM people ORDER BY id')).toEqual([
      { id: 1, full_name: 'ABBY' },
      { id: 2, full_name: 'BILL' },
    ]);
    expect(listIndexNames(db, 'people')).toEqual(['people_name']);
    expect(indexColumns(db, 'people_name')).toEqual(['full_name']);
    expect(listTableNames(db)).toEqual(['people']);
  });

  it('should run execute callbacks against the database', () => {
    const v2 = new VersionBuilder(2, v1.snapshot)
      .execute((conn) => {
        conn.run('UPDATE people SET age = ? WHERE age IS NULL', [0]);
      }, 'default ages')
      .build();
    executor.applyVersion({ number: 2, operations: v2.operations });

    expect(db.all('SELECT age FROM people ORDER BY id')).toEqual([{ age: 30 }, { age: 0 }]);
  });

  it('should wrap statement failures with the failing operation', () => {
    const v2 = new VersionBuilder(2, v1.snapshot)
      .alterTable('people', (t) => t.addColumn('nickname', ColumnType.Text, { constraints: ['NOT NULL'] }))
      .build();

    let caught: unknown;
    try {
      executor.applyVersion({ number: 2, operations: v2.operations });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MigrationExecutionError);
    if (caught instanceof MigrationExecutionError) {
      expect(caught.message).toBe(
        "Version 2: rebuildTable 'people' failed: NOT NULL constraint failed: people__rebuild.nickname"
      );
      expect(caught.operation).toBe('rebuildTable');
      expect(caught.target).toBe('people');
      expect(caught.sql).toBe(
        'INSERT INTO "people__rebuild" ("id", "name", "age") SELECT "id", "name", "age" FROM "people"'
      );
      expect(caught.sqliteCode).toBe('SQLITE_CONSTRAINT_NOTNULL');
    }
  });

  it('should wrap callback failures', () => {
    const v2 = new VersionBuilder(2, v1.snapshot)
      .execute((conn) => conn.exec('INSERT INTO nope VALUES (1)'), 'broken step')
      .build();

    expect(() => executor.applyVersion({ number: 2, operations: v2.operations })).toThrow(
      "Version 2: execute 'broken step' failed: no such table: nope"
    );
  });

  it('should reject asynchronous callbacks', () => {
    const v2 = new VersionBuilder(2, v1.snapshot).execute(async () => undefined).build();

    expect(() => executor.applyVersion({ number: 2, operations: v2.operations })).toThrow(
      'Version 2: execute failed: execute callbacks must be synchronous; the callback returned a promise'
    );
  });

  describe('foreign key checks', () => {
    let fkDb: BetterSqliteDatabase;
    const authors = new VersionBuilder(1)
      .createTable('authors', (t) => {
        t.primaryKey('id');
        t.column('name', ColumnType.Text);
      })
      .createTable('books', (t) => {
        t.primaryKey('id');
        t.column('author_id', ColumnType.Integer, 'REFERENCES authors(id)');
      })
      .build();
    const shiftIds = new VersionBuilder(2, authors.snapshot)
      .alterTable('authors', (t) => t.alterColumn('id', { setValue: 'id + 100' }))
      .build();

    beforeEach(() => {
      fkDb = openMemoryDatabase();
      fkDb.exec('PRAGMA foreign_keys = OFF');
      new MigrationExecutor(fkDb, { logger }).applyVersion({ number: 1, operations: authors.operations });
      fkDb.exec("INSERT INTO authors (id, name) VALUES (1, 'Ann'); INSERT INTO books (id, author_id) VALUES (1, 1);");
    });

    it('should fail a rebuild that breaks references', () => {
      const run = (): void =>
        fkDb.transaction(() =>
          new MigrationExecutor(fkDb, { logger }).applyVersion({ number: 2, operations: shiftIds.operations })
        );

      expect(run).toThrow(ForeignKeyViolationError);
      expect(run).toThrow("Rebuilding 'authors' violated foreign keys: books REFERENCES authors");
      expect(fkDb.all('SELECT id FROM authors')).toEqual([{ id: 1 }]);
    });

    it('should skip the check when disabled', () => {
      new MigrationExecutor(fkDb, { logger, checkForeignKeys: false }).applyVersion({
        number: 2,
        operations: shiftIds.operations,
      });
      expect(fkDb.all('SELECT id FROM authors')).toEqual([{ id: 101 }]);
    });
  });
});

/**
 * @fileoverview Tests for SQL text helpers
 */

import { describe, it, expect } from 'vitest';
import {
  addColumnSql,
  copyRowsSql,
  createIndexSql,
  createTableSql,
  dropIndexSql,
  dropTableSql,
  escapeIdentifier,
  renameTableSql,
} from '../sql.js';

describe('escapeIdentifier', () => {
  it('should wrap identifiers in double quotes', () => {
    expect(escapeIdentifier('people')).toBe('"people"');
  });

  it('should double embedded double quotes', () => {
    expect(escapeIdentifier('say "hi"')).toBe('"say ""hi"""');
  });
});

describe('statement builders', () => {
  it('should build CREATE TABLE', () => {
    expect(createTableSql('people', ['"id" INTEGER PRIMARY KEY', '"name" TEXT'])).toBe(
      'CREATE TABLE "people" ("id" INTEGER PRIMARY KEY, "name" TEXT)'
    );
    expect(createTableSql('t', ['"a"'], true)).toBe('CREATE TABLE IF NOT EXISTS "t" ("a")');
  });

  it('should build DROP and RENAME statements', () => {
    expect(dropTableSql('people')).toBe('DROP TABLE "people"');
    expect(dropTableSql('people', true)).toBe('DROP TABLE IF EXISTS "people"');
    expect(renameTableSql('a', 'b')).toBe('ALTER TABLE "a" RENAME TO "b"');
    expect(dropIndexSql('idx', true)).toBe('DROP INDEX IF EXISTS "idx"');
  });

  it('should build ADD COLUMN', () => {
    expect(addColumnSql('people', '"email" TEXT')).toBe('ALTER TABLE "people" ADD COLUMN "email" TEXT');
  });

  it('should build CREATE INDEX with every option', () => {
    expect(
      createIndexSql('people_names', 'people', ['last', 'first'], {
        unique: true,
        ifNotExists: true,
        where: 'last IS NOT NULL',
      })
    ).toBe('CREATE UNIQUE INDEX IF NOT EXISTS "people_names" ON "people" ("last", "first") WHERE last IS NOT NULL');
  });

  it('should build CREATE INDEX without options', () => {
    expect(createIndexSql('idx', 't', ['a'])).toBe('CREATE INDEX "idx" ON "t" ("a")');
  });

  it('should build INSERT ... SELECT copies', () => {
    expect(copyRowsSql('tmp', 'orig', ['a', 'b'], ['"a"', 'upper("b")'])).toBe(
      'INSERT INTO "tmp" ("a", "b") SELECT "a", upper("b") FROM "orig"'
    );
  });

  it('should reject mismatched column and source counts', () => {
    expect(() => copyRowsSql('tmp', 'orig', ['a', 'b'], ['"a"'])).toThrow(
      'copyRowsSql: 2 columns but 1 source expressions'
    );
  });
});

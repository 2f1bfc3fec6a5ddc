/**
 * @fileoverview Index model
 */

export interface TableIndex {
  /** Unique within a snapshot; separate namespace from tables */
  readonly name: string;
  readonly tableName: string;
  /** Indexed column names, in index order */
  readonly columns: readonly string[];
  readonly unique: boolean;
  /**
   * Partial index predicate, e.g. "name IS NOT NULL". Never rewritten when
   * columns are renamed.
   */
  readonly where?: string;
}

export interface IndexDefinition {
  columns: readonly string[];
  unique?: boolean;
  where?: string;
}

export function createIndex(name: string, tableName: string, definition: IndexDefinition): TableIndex {
  const index: TableIndex = {
    name,
    tableName,
    columns: Object.freeze([...definition.columns]),
    unique: definition.unique ?? false,
    ...(definition.where !== undefined ? { where: definition.where } : {}),
  };
  return Object.freeze(index);
}

export function withTableName(index: TableIndex, tableName: string): TableIndex {
  return Object.freeze({ ...index, tableName });
}

export function renamedIndex(index: TableIndex, name: string): TableIndex {
  return Object.freeze({ ...index, name });
}

export function withColumns(index: TableIndex, columns: readonly string[]): TableIndex {
  return Object.freeze({ ...index, columns: Object.freeze([...columns]) });
}

/**
 * @fileoverview Index remapping
 *
 * Keeps index definitions valid across table rebuilds and renames. Column
 * lists follow renames; an index over a dropped column is dropped with it.
 * `where` predicates are carried verbatim and never rewritten.
 */

import { withColumns, withTableName, type TableIndex } from '../model/table-index.js';

export interface IndexRemapResult {
  /** Surviving indexes with rewritten column lists */
  readonly indexes: readonly TableIndex[];
  /** Names of indexes that covered a dropped column */
  readonly dropped: readonly string[];
}

/**
 * Rewrite indexes through a rebuild's column map (old name -> new name).
 * Columns missing from the map were dropped.
 */
export function remapIndexes(
  indexes: readonly TableIndex[],
  columnMap: ReadonlyMap<string, string>
): IndexRemapResult {
  const kept: TableIndex[] = [];
  const dropped: string[] = [];

  for (const index of indexes) {
    const columns: string[] = [];
    for (const column of index.columns) {
      const mapped = columnMap.get(column);
      if (mapped === undefined) break;
      columns.push(mapped);
    }

    if (columns.length === index.columns.length) {
      kept.push(withColumns(index, columns));
    } else {
      dropped.push(index.name);
    }
  }

  return { indexes: kept, dropped };
}

/**
 * Point indexes at a renamed table.
 */
export function retargetIndexes(indexes: readonly TableIndex[], tableName: string): TableIndex[] {
  return indexes.map((index) => withTableName(index, tableName));
}

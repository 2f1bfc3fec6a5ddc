/**
 * @fileoverview SQL text helpers
 *
 * Statement builders for the handful of DDL forms the migration engine
 * emits. Identifiers are always quoted.
 */

export function escapeIdentifier(identifier: string): string {
  return `"${identifier.replaceAll('"', '""')}"`;
}

export function createTableSql(name: string, definitions: readonly string[], ifNotExists = false): string {
  const ine = ifNotExists ? ' IF NOT EXISTS' : '';
  return `CREATE TABLE${ine} ${escapeIdentifier(name)} (${definitions.join(', ')})`;
}

export function dropTableSql(name: string, ifExists = false): string {
  const ie = ifExists ? ' IF EXISTS' : '';
  return `DROP TABLE${ie} ${escapeIdentifier(name)}`;
}

export function renameTableSql(from: string, to: string): string {
  return `ALTER TABLE ${escapeIdentifier(from)} RENAME TO ${escapeIdentifier(to)}`;
}

export function addColumnSql(tableName: string, columnDefinition: string): string {
  return `ALTER TABLE ${escapeIdentifier(tableName)} ADD COLUMN ${columnDefinition}`;
}

export interface CreateIndexSqlOptions {
  unique?: boolean;
  where?: string;
  ifNotExists?: boolean;
}

export function createIndexSql(
  name: string,
  tableName: string,
  columns: readonly string[],
  options: CreateIndexSqlOptions = {}
): string {
  const parts = ['CREATE'];
  if (options.unique) parts.push('UNIQUE');
  parts.push('INDEX');
  if (options.ifNotExists) parts.push('IF NOT EXISTS');
  parts.push(escapeIdentifier(name), 'ON', escapeIdentifier(tableName));
  parts.push(`(${columns.map(escapeIdentifier).join(', ')})`);
  if (options.where !== undefined) {
    parts.push('WHERE', options.where);
  }
  return parts.join(' ');
}

export function dropIndexSql(name: string, ifExists = false): string {
  const ie = ifExists ? ' IF EXISTS' : '';
  return `DROP INDEX${ie} ${escapeIdentifier(name)}`;
}

/**
 * INSERT ... SELECT copying `sources[i]` into `columns[i]`.
 */
export function copyRowsSql(
  into: string,
  from: string,
  columns: readonly string[],
  sources: readonly string[]
): string {
  if (columns.length !== sources.length) {
    throw new Error(`copyRowsSql: ${columns.length} columns but ${sources.length} source expressions`);
  }
  return (
    `INSERT INTO ${escapeIdentifier(into)} (${columns.map(escapeIdentifier).join(', ')}) ` +
    `SELECT ${sources.join(', ')} FROM ${escapeIdentifier(from)}`
  );
}

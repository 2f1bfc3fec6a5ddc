/**
 * @fileoverview tablewright public API
 *
 * Versioned schema migrations for SQLite.
 */

// Schema
export { Schema, SchemaBuilder, type SchemaOptions, type VersionPlan } from './schema.js';
export { Version, VersionChain, type VersionBlock, type VersionDeclaration } from './builder/version-chain.js';
export { VersionBuilder, type DropOptions, type BuiltVersion } from './builder/version-builder.js';
export { TableBuilder, type PrimaryKeyOptions } from './builder/table-builder.js';

// Compiler
export {
  TableAlterer,
  compileAlterTable,
  temporaryTableName,
  type AddColumnOptions,
  type AlterColumnOptions,
  type AlterTableInput,
  type AlterTableResult,
  type TableEdit,
} from './compiler/alter-table.js';
export { remapIndexes, retargetIndexes, type IndexRemapResult } from './compiler/index-remapper.js';

// Model
export * from './model/index.js';

// Execution
export { MigrationExecutor, type ExecutableVersion, type ExecutorOptions } from './executor/executor.js';
export {
  Migrator,
  withForeignKeysDisabled,
  type MigrateOptions,
  type MigrationResult,
  type MigrationState,
} from './executor/migrator.js';
export { OperationSqlGenerator } from './executor/sql-generator.js';

// Database
export {
  BetterSqliteDatabase,
  DatabaseConnection,
  openMemoryDatabase,
  wrapDatabase,
} from './database/connection.js';
export type { DatabaseConfig, RunResult, SqlDatabase, SqlParams, SqlValue } from './database/types.js';
export { TableVersionStore, UserVersionStore, type VersionStore } from './database/version-store.js';
export {
  foreignKeyViolations,
  foreignKeysEnabled,
  indexColumns,
  indexDetails,
  listIndexNames,
  listSchemaEntries,
  listTableNames,
  tableColumns,
  tableExists,
  type ColumnInfo,
  type IndexDetails,
  type SchemaEntry,
  type SchemaEntryType,
} from './database/inspect.js';
export { escapeIdentifier } from './database/sql.js';

// Errors
export * from './errors.js';

// Logging & settings
export * from './logging/index.js';
export {
  loadSettings,
  getSettings,
  clearSettingsCache,
  DEFAULT_SETTINGS,
  type TablewrightSettings,
} from './settings/index.js';

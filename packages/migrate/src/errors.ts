/**
 * @fileoverview Migration Error Types
 *
 * Typed error hierarchy for schema declaration, migration preconditions and
 * migration execution. Callers branch on `code` or `instanceof`, never on
 * message text.
 */

import Database from 'better-sqlite3';

export const MigrationErrorCode = {
  // Raised while a Schema or Version is being declared/compiled
  DECLARATION: 'DECLARATION',
  // Raised by migrate() before the database is touched
  PRECONDITION: 'PRECONDITION',
  UNKNOWN_VERSION: 'UNKNOWN_VERSION',
  UNREACHABLE_VERSION: 'UNREACHABLE_VERSION',
  // Raised while operations run against the database
  EXECUTION: 'EXECUTION',
  FOREIGN_KEY_VIOLATION: 'FOREIGN_KEY_VIOLATION',
} as const;

export type MigrationErrorCodeType = (typeof MigrationErrorCode)[keyof typeof MigrationErrorCode];

/**
 * Base migration error class
 */
export class MigrationError extends Error {
  override readonly name: string = 'MigrationError';

  constructor(
    public readonly code: MigrationErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A version block declared something inconsistent with its snapshot:
 * duplicate names, unknown tables/columns/indexes, bad version numbering.
 */
export class SchemaDeclarationError extends MigrationError {
  override readonly name = 'SchemaDeclarationError';

  constructor(
    message: string,
    public readonly version?: number
  ) {
    super(MigrationErrorCode.DECLARATION, version === undefined ? message : `Version ${version}: ${message}`);
  }
}

export class MigrationPreconditionError extends MigrationError {
  override readonly name = 'MigrationPreconditionError';

  constructor(message: string) {
    super(MigrationErrorCode.PRECONDITION, message);
  }
}

/**
 * The persisted version number isn't declared by the schema.
 */
export class UnknownDatabaseVersionError extends MigrationError {
  override readonly name = 'UnknownDatabaseVersionError';

  constructor(public readonly databaseVersion: number) {
    super(
      MigrationErrorCode.UNKNOWN_VERSION,
      `The database version (${databaseVersion}) isn't defined in the schema`
    );
  }
}

export class UnreachableVersionError extends MigrationError {
  override readonly name = 'UnreachableVersionError';

  constructor(
    public readonly fromVersion: number,
    public readonly toVersion: number
  ) {
    super(
      MigrationErrorCode.UNREACHABLE_VERSION,
      `Unable to migrate from ${fromVersion} to ${toVersion}: migrations only run forward`
    );
  }
}

export interface ExecutionErrorDetails {
  /** Version whose operation failed */
  version: number;
  /** Operation kind, e.g. 'rebuildTable' */
  operation: string;
  /** Table or index the operation targets, when it has one */
  target?: string;
  /** Statement that failed, when the failure came from SQL */
  sql?: string;
}

export class MigrationExecutionError extends MigrationError {
  override readonly name = 'MigrationExecutionError';
  readonly version: number;
  readonly operation: string;
  readonly target: string | undefined;
  readonly sql: string | undefined;
  /** SQLite extended result code, e.g. 'SQLITE_CONSTRAINT_NOTNULL' */
  readonly sqliteCode: string | undefined;

  constructor(details: ExecutionErrorDetails, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = details.target ? ` '${details.target}'` : '';
    super(
      MigrationErrorCode.EXECUTION,
      `Version ${details.version}: ${details.operation}${target} failed: ${reason}`,
      { cause }
    );
    this.version = details.version;
    this.operation = details.operation;
    this.target = details.target;
    this.sql = details.sql;
    this.sqliteCode = sqliteErrorCode(cause);
  }
}

export interface ForeignKeyViolation {
  table: string;
  rowid: number | null;
  parent: string;
  fkid: number;
}

export class ForeignKeyViolationError extends MigrationError {
  override readonly name = 'ForeignKeyViolationError';

  constructor(
    public readonly tableName: string,
    public readonly violations: readonly ForeignKeyViolation[]
  ) {
    const references = [...new Set(violations.map((v) => `${v.table} REFERENCES ${v.parent}`))];
    super(
      MigrationErrorCode.FOREIGN_KEY_VIOLATION,
      `Rebuilding '${tableName}' violated foreign keys: ${references.join(', ')}`
    );
  }
}

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}

export function sqliteErrorCode(error: unknown): string | undefined {
  if (error instanceof Database.SqliteError) {
    return error.code;
  }
  if (error instanceof MigrationExecutionError) {
    return error.sqliteCode;
  }
  return undefined;
}

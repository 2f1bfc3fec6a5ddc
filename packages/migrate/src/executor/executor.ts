/**
 * @fileoverview Operation executor
 *
 * Runs a version's operations, one statement at a time, against the open
 * migration transaction. The caller owns the transaction; any failure is
 * raised as a MigrationExecutionError and unwinds it.
 */

import { foreignKeyViolations } from '../database/inspect.js';
import type { SqlDatabase } from '../database/types.js';
import { ForeignKeyViolationError, MigrationError, MigrationExecutionError } from '../errors.js';
import { createLogger, type MigrationLogger } from '../logging/index.js';
import { operationTarget, type Operation } from '../model/operations.js';
import { OperationSqlGenerator } from './sql-generator.js';

export interface ExecutableVersion {
  readonly number: number;
  readonly operations: readonly Operation[];
}

export interface ExecutorOptions {
  /** Run PRAGMA foreign_key_check after every table rebuild */
  checkForeignKeys?: boolean;
  logger?: MigrationLogger;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

export class MigrationExecutor {
  private readonly generator = new OperationSqlGenerator();
  private readonly checkForeignKeys: boolean;
  private readonly logger: MigrationLogger;

  constructor(
    private readonly db: SqlDatabase,
    options: ExecutorOptions = {}
  ) {
    this.checkForeignKeys = options.checkForeignKeys ?? true;
    this.logger = options.logger ?? createLogger('migration-executor');
  }

  applyVersion(version: ExecutableVersion): void {
    const log = this.logger.child({ version: version.number });
    const done = log.startTimer('Version applied', { operations: version.operations.length });

    for (const operation of version.operations) {
      this.apply(operation, version.number, log);
    }
    done();
  }

  private apply(operation: Operation, versionNumber: number, log: MigrationLogger): void {
    const target = operationTarget(operation);
    const details = {
      version: versionNumber,
      operation: operation.kind,
      ...(target !== undefined ? { target } : {}),
    };
    log.debug({ operation: operation.kind, target }, 'Applying operation');

    if (operation.kind === 'execute') {
      this.runCallback(operation.callback, details);
      return;
    }

    for (const sql of this.generator.statements(operation)) {
      log.trace({ sql }, 'Executing statement');
      try {
        this.db.exec(sql);
      } catch (error) {
        throw new MigrationExecutionError({ ...details, sql }, error);
      }
    }

    if (operation.kind === 'rebuildTable' && this.checkForeignKeys) {
      const violations = foreignKeyViolations(this.db);
      if (violations.length > 0) {
        log.error({ table: operation.originalName, violations: violations.length }, 'Rebuild violated foreign keys');
        throw new ForeignKeyViolationError(operation.originalName, violations);
      }
    }
  }

  private runCallback(
    callback: (db: SqlDatabase) => void,
    details: { version: number; operation: string; target?: string }
  ): void {
    let result: unknown;
    try {
      result = callback(this.db);
    } catch (error) {
      if (error instanceof MigrationError) throw error;
      throw new MigrationExecutionError(details, error);
    }
    if (isPromiseLike(result)) {
      // The work already escaped the transaction; surface its outcome in the log
      void Promise.resolve(result).catch((error: unknown) => {
        this.logger.warn({ version: details.version, err: error }, 'Asynchronous execute callback rejected');
      });
      throw new MigrationExecutionError(
        details,
        new Error('execute callbacks must be synchronous; the callback returned a promise')
      );
    }
  }
}

/**
 * @fileoverview Migrator
 *
 * Drives one migration run:
 *
 *   idle -> determining-range -> applying -> committed | rolled-back
 *
 * Preconditions are checked before the database is touched. Everything
 * after that, from reading the stored version to writing the new one, runs
 * in a single transaction.
 */

import type { Version, VersionChain } from '../builder/version-chain.js';
import { foreignKeysEnabled, listSchemaEntries } from '../database/inspect.js';
import { dropIndexSql, dropTableSql } from '../database/sql.js';
import type { SqlDatabase } from '../database/types.js';
import type { VersionStore } from '../database/version-store.js';
import {
  MigrationPreconditionError,
  UnknownDatabaseVersionError,
  UnreachableVersionError,
} from '../errors.js';
import type { MigrationLogger } from '../logging/index.js';
import { MigrationExecutor } from './executor.js';

export interface MigrateOptions {
  /**
   * When the stored version isn't declared (or can't be read), drop every
   * table and index in the database and migrate from scratch
   */
  resetUnknownVersions?: boolean;
  /** When the target is below the stored version, reset and replay forward */
  resetOnDowngrade?: boolean;
  /** Check foreign keys after each table rebuild */
  checkForeignKeys?: boolean;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  /** Versions applied, ascending */
  applied: number[];
  /** Whether the database changed */
  migrated: boolean;
  /** Whether existing tables were dropped before applying */
  reset: boolean;
}

export type MigrationState = 'idle' | 'determining-range' | 'applying' | 'committed' | 'rolled-back';

export interface MigratorConfig {
  chain: VersionChain;
  store: VersionStore;
  logger: MigrationLogger;
  checkForeignKeys: boolean;
}

/**
 * Run `fn` with foreign key enforcement off, restoring it afterwards.
 * Inside an open transaction the pragma is a no-op, so it is left alone;
 * the migrator refuses rebuilds in that case.
 */
export function withForeignKeysDisabled<T>(db: SqlDatabase, fn: () => T): T {
  if (db.inTransaction || !foreignKeysEnabled(db)) {
    return fn();
  }
  db.exec('PRAGMA foreign_keys = OFF');
  try {
    return fn();
  } finally {
    db.exec('PRAGMA foreign_keys = ON');
  }
}

function assertNoRebuilds(versions: readonly Version[]): void {
  for (const version of versions) {
    const rebuild = version.operations.find((op) => op.kind === 'rebuildTable');
    if (rebuild?.kind === 'rebuildTable') {
      throw new MigrationPreconditionError(
        `Version ${version.number} rebuilds table '${rebuild.originalName}', which is unsafe while ` +
          'foreign keys are enforced inside an open transaction; turn off PRAGMA foreign_keys ' +
          'before the transaction or migrate outside it'
      );
    }
  }
}

export class Migrator {
  private currentState: MigrationState = 'idle';

  constructor(private readonly config: MigratorConfig) {}

  get state(): MigrationState {
    return this.currentState;
  }

  migrate(db: SqlDatabase, toVersion?: number, options: MigrateOptions = {}): MigrationResult {
    if (this.currentState !== 'idle') {
      throw new MigrationPreconditionError(`Migrator already used (state: ${this.currentState})`);
    }
    const { chain, logger } = this.config;
    const target = toVersion ?? chain.latest;
    this.checkTarget(target);

    // Compile up front so declaration errors surface before any SQL runs
    if (target > 0) chain.resolve(target);

    // A rebuild drops the old table, which cascades into child rows
    // unless enforcement is off
    const enforcedInTransaction = db.inTransaction && foreignKeysEnabled(db);

    try {
      const result = withForeignKeysDisabled(db, () =>
        db.transaction(() => this.run(db, target, options, enforcedInTransaction))
      );
      this.transition('committed');
      if (result.migrated) {
        logger.info(
          { fromVersion: result.fromVersion, toVersion: result.toVersion, applied: result.applied },
          'Migration committed'
        );
      }
      return result;
    } catch (error) {
      this.transition('rolled-back');
      logger.error('Migration rolled back', error instanceof Error ? error : { error: String(error) });
      throw error;
    }
  }

  /**
   * Drop every table and index known to any declared version and store
   * version 0.
   */
  reset(db: SqlDatabase): void {
    const { chain, store, logger } = this.config;
    const versions = chain.resolveAll();
    const tables = new Set<string>();
    const indexes = new Set<string>();
    for (const version of versions) {
      version.tableNames.forEach((name) => tables.add(name));
      version.indexNames.forEach((name) => indexes.add(name));
    }

    withForeignKeysDisabled(db, () =>
      db.transaction(() => {
        for (const name of indexes) db.exec(dropIndexSql(name, true));
        for (const name of tables) db.exec(dropTableSql(name, true));
        store.write(db, 0);
      })
    );
    logger.info({ tables: tables.size, indexes: indexes.size }, 'Schema reset');
  }

  // ===========================================================================
  // Run
  // ===========================================================================

  private run(
    db: SqlDatabase,
    target: number,
    options: MigrateOptions,
    enforcedInTransaction: boolean
  ): MigrationResult {
    const { chain, store, logger } = this.config;
    this.transition('determining-range');

    const stored = store.read(db);
    let current = stored ?? 0;
    let reset = false;

    if (stored === null) {
      if (options.resetUnknownVersions) {
        this.dropEverything(db);
        reset = true;
      } else {
        logger.warn('Stored schema version is unreadable; treating it as 0');
      }
    } else if (stored !== 0 && !chain.has(stored)) {
      if (!options.resetUnknownVersions) {
        throw new UnknownDatabaseVersionError(stored);
      }
      logger.warn({ storedVersion: stored }, 'Stored schema version is not declared; resetting database');
      this.dropEverything(db);
      current = 0;
      reset = true;
    }

    if (target < current) {
      if (!options.resetOnDowngrade) {
        throw new UnreachableVersionError(current, target);
      }
      logger.warn({ fromVersion: current, toVersion: target }, 'Downgrade requested; resetting database');
      this.dropEverything(db);
      current = 0;
      reset = true;
    }

    const fromVersion = stored ?? 0;
    if (current === target && !reset) {
      return { fromVersion, toVersion: target, applied: [], migrated: false, reset };
    }

    const versions: Version[] = [];
    for (const number of chain.numbersBetween(current, target)) {
      const version = chain.resolve(number);
      if (version) versions.push(version);
    }
    if (enforcedInTransaction) assertNoRebuilds(versions);

    this.transition('applying');
    const executor = new MigrationExecutor(db, {
      checkForeignKeys: options.checkForeignKeys ?? this.config.checkForeignKeys,
      logger,
    });
    const applied: number[] = [];
    for (const version of versions) {
      executor.applyVersion(version);
      applied.push(version.number);
    }

    store.write(db, target);
    return { fromVersion, toVersion: target, applied, migrated: true, reset };
  }

  private checkTarget(target: number): void {
    const { chain } = this.config;
    if (!Number.isInteger(target)) {
      throw new MigrationPreconditionError(`Target version must be an integer, got ${target}`);
    }
    if (target < 0) {
      throw new MigrationPreconditionError(`Target version must not be negative, got ${target}`);
    }
    if (target > chain.latest) {
      throw new MigrationPreconditionError(
        `Target version ${target} exceeds the latest declared version (${chain.latest})`
      );
    }
    if (target !== 0 && !chain.has(target)) {
      throw new MigrationPreconditionError(
        `Version ${target} is not declared; the schema starts at version ${chain.first ?? 0}`
      );
    }
  }

  /**
   * Drop every table and index in the database except SQLite's own and
   * the version store's.
   */
  private dropEverything(db: SqlDatabase): void {
    const reserved = new Set(this.config.store.reservedTables);
    const entries = listSchemaEntries(db).filter((entry) => !reserved.has(entry.tableName));

    for (const entry of entries) {
      if (entry.type === 'index') db.exec(dropIndexSql(entry.name, true));
    }
    for (const entry of entries) {
      if (entry.type === 'table') db.exec(dropTableSql(entry.name, true));
    }
  }

  private transition(next: MigrationState): void {
    this.config.logger.trace({ from: this.currentState, to: next }, 'Migration state');
    this.currentState = next;
  }
}

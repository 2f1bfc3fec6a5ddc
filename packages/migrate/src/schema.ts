/**
 * @fileoverview Schema
 *
 * A schema is an ordered list of versions declared once, up front:
 *
 * ```ts
 * const schema = new Schema('app', (s) => {
 *   s.version(1, (v) => {
 *     v.createTable('people', (t) => {
 *       t.primaryKey('id');
 *       t.column('name', ColumnType.Text, 'NOT NULL');
 *     });
 *   });
 *   s.version(2, (v) => {
 *     v.alterTable('people', (t) => t.alterColumn('name', { renameTo: 'full_name' }));
 *   });
 * });
 *
 * schema.migrate(db);
 * ```
 *
 * Version blocks are compiled lazily, the first time a version (or a later
 * one) is needed, and cached.
 */

import { VersionChain, type Version, type VersionBlock, type VersionDeclaration } from './builder/version-chain.js';
import { TableVersionStore, type VersionStore } from './database/version-store.js';
import type { SqlDatabase } from './database/types.js';
import { MigrationPreconditionError } from './errors.js';
import { OperationSqlGenerator } from './executor/sql-generator.js';
import { Migrator, type MigrateOptions, type MigrationResult } from './executor/migrator.js';
import { createLogger, type MigrationLogger } from './logging/index.js';
import type { Operation } from './model/operations.js';
import { getSettings } from './settings/index.js';

export interface SchemaOptions {
  /** Defaults to a TableVersionStore keyed by the schema identifier */
  versionStore?: VersionStore;
  logger?: MigrationLogger;
  /** Default for MigrateOptions.checkForeignKeys; falls back to settings */
  checkForeignKeys?: boolean;
}

export interface VersionPlan {
  version: number;
  statements: string[];
}

/**
 * Collects version declarations inside the Schema constructor.
 */
export class SchemaBuilder {
  private readonly declarations: VersionDeclaration[] = [];

  version(number: number, block: VersionBlock): this {
    this.declarations.push({ number, block });
    return this;
  }

  getDeclarations(): readonly VersionDeclaration[] {
    return [...this.declarations];
  }
}

export class Schema {
  private readonly chain: VersionChain;
  private readonly store: VersionStore;
  private readonly logger: MigrationLogger;
  private readonly checkForeignKeys: boolean;

  constructor(
    readonly identifier: string,
    declare: (schema: SchemaBuilder) => void,
    options: SchemaOptions = {}
  ) {
    const builder = new SchemaBuilder();
    declare(builder);
    this.chain = new VersionChain(builder.getDeclarations());
    this.store = options.versionStore ?? new TableVersionStore(identifier);
    this.logger = options.logger ?? createLogger('schema', { schema: identifier });
    this.checkForeignKeys = options.checkForeignKeys ?? getSettings().checkForeignKeys;
  }

  get versionNumbers(): number[] {
    return this.chain.numbers;
  }

  /** Highest declared version number, 0 when none */
  get latestVersionNumber(): number {
    return this.chain.latest;
  }

  get latestVersion(): Version | undefined {
    return this.chain.resolve(this.chain.latest);
  }

  version(number: number): Version | undefined {
    return this.chain.resolve(number);
  }

  /**
   * Compile every version, raising the first declaration error.
   */
  validate(): void {
    this.chain.resolveAll();
  }

  /** Operations for versions in (from, to], in order */
  operationsBetween(from: number, to: number): Operation[] {
    return this.versionsBetween(from, to).flatMap((version) => [...version.operations]);
  }

  /**
   * The statements a migration from `from` to `to` would run, per version.
   * Nothing is executed.
   */
  plan(from: number, to: number = this.chain.latest): VersionPlan[] {
    const generator = new OperationSqlGenerator();
    return this.versionsBetween(from, to).map((version) => ({
      version: version.number,
      statements: version.operations.flatMap((operation) => generator.describe(operation)),
    }));
  }

  /**
   * Bring `db` to `toVersion` (default: latest) in one transaction.
   */
  migrate(db: SqlDatabase, toVersion?: number, options: MigrateOptions = {}): MigrationResult {
    return this.createMigrator().migrate(db, toVersion, options);
  }

  /**
   * Drop every table and index any declared version knows about, and
   * store version 0.
   */
  reset(db: SqlDatabase): void {
    this.createMigrator().reset(db);
  }

  /** The version stored in `db`; null when unreadable */
  currentVersion(db: SqlDatabase): number | null {
    return this.store.read(db);
  }

  private createMigrator(): Migrator {
    return new Migrator({
      chain: this.chain,
      store: this.store,
      logger: this.logger,
      checkForeignKeys: this.checkForeignKeys,
    });
  }

  private versionsBetween(from: number, to: number): Version[] {
    if (from > to) {
      throw new MigrationPreconditionError(`Unable to list versions from ${from} down to ${to}`);
    }
    const versions: Version[] = [];
    for (const number of this.chain.numbersBetween(from, to)) {
      const version = this.chain.resolve(number);
      if (version) versions.push(version);
    }
    return versions;
  }
}

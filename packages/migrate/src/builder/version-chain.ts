/**
 * @fileoverview Version chain
 *
 * Declared version blocks, compiled lazily. Compiling version N replays
 * every block up to N against the snapshot of the one before, and each
 * result is cached. A block that fails to compile caches nothing, so the
 * same error is raised again on the next request.
 */

import { SchemaDeclarationError } from '../errors.js';
import type { Operation } from '../model/operations.js';
import { SchemaSnapshot } from '../model/snapshot.js';
import type { Table } from '../model/table.js';
import type { TableIndex } from '../model/table-index.js';
import { VersionBuilder } from './version-builder.js';

export type VersionBlock = (version: VersionBuilder) => void;

export interface VersionDeclaration {
  readonly number: number;
  readonly block: VersionBlock;
}

/**
 * A compiled version: its snapshot and the operations that produced it.
 */
export class Version {
  constructor(
    readonly number: number,
    readonly snapshot: SchemaSnapshot,
    readonly operations: readonly Operation[]
  ) {}

  get tableNames(): string[] {
    return this.snapshot.tableNames;
  }

  get indexNames(): string[] {
    return this.snapshot.indexNames;
  }

  table(name: string): Table | undefined {
    return this.snapshot.table(name);
  }

  index(name: string): TableIndex | undefined {
    return this.snapshot.index(name);
  }
}

export class VersionChain {
  private readonly declarations: readonly VersionDeclaration[];
  private readonly compiled: Version[] = [];

  /**
   * @throws SchemaDeclarationError unless numbers are positive integers,
   *   ascending and contiguous. The first may be above 1.
   */
  constructor(declarations: readonly VersionDeclaration[]) {
    let previous: number | undefined;
    for (const { number } of declarations) {
      if (!Number.isInteger(number) || number < 1) {
        throw new SchemaDeclarationError(`Version numbers must be positive integers, got ${number}`);
      }
      if (previous !== undefined && number !== previous + 1) {
        throw new SchemaDeclarationError(
          number <= previous
            ? `Version ${number} is declared after version ${previous}; versions must ascend without duplicates`
            : `Version ${number} follows version ${previous}; versions must be contiguous`
        );
      }
      previous = number;
    }
    this.declarations = [...declarations];
  }

  get numbers(): number[] {
    return this.declarations.map((d) => d.number);
  }

  get first(): number | undefined {
    return this.declarations[0]?.number;
  }

  /** Highest declared version, 0 when none */
  get latest(): number {
    return this.declarations[this.declarations.length - 1]?.number ?? 0;
  }

  has(number: number): boolean {
    return this.declarations.some((d) => d.number === number);
  }

  /**
   * Compile (or fetch) version `number`, compiling every earlier one first.
   */
  resolve(number: number): Version | undefined {
    const position = this.declarations.findIndex((d) => d.number === number);
    if (position < 0) return undefined;

    while (this.compiled.length <= position) {
      const declaration = this.declarations[this.compiled.length];
      if (!declaration) break;
      const previous = this.compiled[this.compiled.length - 1]?.snapshot ?? SchemaSnapshot.empty;
      this.compiled.push(compile(declaration, previous));
    }
    return this.compiled[position];
  }

  /** Compile every declared version */
  resolveAll(): Version[] {
    const last = this.latest;
    if (last > 0) this.resolve(last);
    return [...this.compiled];
  }

  /** Declared numbers in (from, to], ascending */
  numbersBetween(from: number, to: number): number[] {
    return this.numbers.filter((n) => n > from && n <= to);
  }
}

function compile(declaration: VersionDeclaration, previous: SchemaSnapshot): Version {
  const builder = new VersionBuilder(declaration.number, previous);
  try {
    declaration.block(builder);
  } catch (error) {
    if (error instanceof SchemaDeclarationError && error.version === undefined) {
      throw new SchemaDeclarationError(error.message, declaration.number);
    }
    throw error;
  }
  const built = builder.build();
  return new Version(declaration.number, built.snapshot, built.operations);
}

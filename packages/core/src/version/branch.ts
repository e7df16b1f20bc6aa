/**
 * @module version/branch
 * A single schema version and its place in the version tree.
 */

import { StrataError } from '../core/errors';
import { Change } from '../model/change';
import { SchemaProblem } from '../model/problem';
import { SchemaObject } from '../model/schema';
import { SortByOrder } from '../order/order';
import { SchemaVersionNumber } from './version-number';

/**
 * The full content of one version of a package.
 */
export interface SchemaVersion {
  /** Package name */
  Package: string;

  Version: SchemaVersionNumber;

  /** Changes declared outside any schema object, sorted by order */
  TopChanges: readonly Change[];

  /** Schema objects, sorted by order */
  Schema: readonly SchemaObject[];

  /** Problems found while reading the version */
  Problems: readonly SchemaProblem[];
}

/**
 * Builds a version record, sorting changes and objects by their Order.
 *
 * @throws StrataError (`INVALID_VERSION`) when the package name is empty
 */
export function CreateSchemaVersion(
  pkg: string,
  version: SchemaVersionNumber,
  topChanges: readonly Change[],
  schema: readonly SchemaObject[],
  problems: readonly SchemaProblem[] = []
): SchemaVersion {
  if (pkg.length === 0) {
    throw new StrataError('INVALID_VERSION', 'package name must not be empty');
  }
  return {
    Package: pkg,
    Version: version,
    TopChanges: SortByOrder(topChanges),
    Schema: SortByOrder(schema),
    Problems: [...problems],
  };
}

/**
 * Loads the content of a version on demand.
 */
export type SchemaVersionLoader = (version: SchemaVersionNumber) => SchemaVersion;

/**
 * Where a branch gets its payload from: already in memory, or from a loader
 * called at most once.
 */
export type BranchSource =
  | { Kind: 'loaded'; Payload: SchemaVersion }
  | { Kind: 'lazy'; Loader: SchemaVersionLoader; Version: SchemaVersionNumber };

/**
 * One node of a package's version tree.
 *
 * Branches are created by {@link SchemaPackage}, which guarantees that a
 * branch's parent exists before the branch does.
 */
export class SchemaBranch {
  readonly Package: string;
  readonly Version: SchemaVersionNumber;
  readonly Parent: SchemaBranch | null;

  private readonly children: SchemaBranch[] = [];
  private readonly loader: SchemaVersionLoader | null;
  private payload: SchemaVersion | null;

  constructor(pkg: string, parent: SchemaBranch | null, source: BranchSource) {
    this.Package = pkg;
    this.Parent = parent;
    if (source.Kind === 'loaded') {
      this.payload = source.Payload;
      this.loader = null;
      this.Version = source.Payload.Version;
    } else {
      this.payload = null;
      this.loader = source.Loader;
      this.Version = source.Version;
    }
    parent?.children.push(this);
  }

  get Children(): readonly SchemaBranch[] {
    return this.children;
  }

  get IsPayloadLoaded(): boolean {
    return this.payload !== null;
  }

  /**
   * Returns the version content, calling the loader on first use and caching
   * the result. Not guarded against concurrent first calls.
   *
   * @throws StrataError (`VERSION_MISMATCH`) when the loader returns another
   *   package or version
   */
  GetPayload(): SchemaVersion {
    if (this.payload !== null) {
      return this.payload;
    }
    if (this.loader === null) {
      throw new StrataError('VERSION_MISMATCH', `${this} has neither a payload nor a loader`);
    }
    const loaded = this.loader(this.Version);
    if (!loaded.Version.Equals(this.Version) || loaded.Package !== this.Package) {
      throw new StrataError(
        'VERSION_MISMATCH',
        `loader for ${this} returned ${loaded.Package} : ${loaded.Version}`
      );
    }
    this.payload = loaded;
    return loaded;
  }

  toString(): string {
    return `Branch(${this.Package} : ${this.Version})`;
  }
}

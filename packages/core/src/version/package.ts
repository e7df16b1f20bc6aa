/**
 * @module version/package
 * Assembles the branches of one package into a version tree.
 *
 * Versions may be registered in any order. A registration whose parent is
 * not known yet is parked under that parent's version; when the parent is
 * inserted, everything parked under it is inserted too, which may in turn
 * release registrations parked under those. Whatever is still parked once
 * all input has been registered names a parent that was never supplied.
 */

import { DuplicateBranchError, StrataError } from '../core/errors';
import { BranchSource, SchemaBranch, SchemaVersion, SchemaVersionLoader } from './branch';
import { CompareDecimals, SchemaVersionNumber } from './version-number';

/**
 * A registration waiting for its parent.
 */
interface PendingRegistration {
  Version: SchemaVersionNumber;
  Parent: SchemaVersionNumber;
  Source: BranchSource;
}

/**
 * All the branches of a single package.
 */
export class SchemaPackage {
  readonly Package: string;

  private readonly branches = new Map<string, SchemaBranch>();
  private readonly roots: SchemaBranch[] = [];

  /** Pending registrations, keyed by the missing parent's version key */
  private readonly pending = new Map<string, PendingRegistration[]>();

  constructor(pkg: string) {
    this.Package = pkg;
  }

  /** Number of resolved branches */
  get Size(): number {
    return this.branches.size;
  }

  /** All resolved branches, in insertion order */
  get Branches(): readonly SchemaBranch[] {
    return Array.from(this.branches.values());
  }

  /** Resolved branches with no parent */
  get RootBranches(): readonly SchemaBranch[] {
    return this.roots;
  }

  /**
   * Parent versions that registrations refer to but that have not been
   * registered. Each one is an authoring error once all input is in.
   */
  get UnresolvedBranchVersions(): SchemaVersionNumber[] {
    return Array.from(this.pending.values()).map((waiting) => waiting[0].Parent);
  }

  /**
   * Versions of the registrations still waiting for a parent.
   */
  get PendingBranchVersions(): SchemaVersionNumber[] {
    const ret: SchemaVersionNumber[] = [];
    for (const waiting of this.pending.values()) {
      ret.push(...waiting.map((p) => p.Version));
    }
    return ret;
  }

  Has(version: SchemaVersionNumber): boolean {
    return this.branches.has(version.Key);
  }

  Get(version: SchemaVersionNumber): SchemaBranch | undefined {
    return this.branches.get(version.Key);
  }

  /**
   * Finds a resolved branch by its textual version (`"1.2"` or `"v1.2"`).
   */
  FindVersion(text: string): SchemaBranch | undefined {
    const version = SchemaVersionNumber.Parse(text);
    return version ? this.Get(version) : undefined;
  }

  /**
   * Resolved version numbers, sorted.
   */
  Versions(): SchemaVersionNumber[] {
    return this.Branches.map((b) => b.Version).sort(CompareDecimals);
  }

  /**
   * The resolved branch with the highest version, or undefined when the
   * package has no resolved branches.
   */
  NewestVersion(): SchemaBranch | undefined {
    let newest: SchemaBranch | undefined;
    for (const branch of this.branches.values()) {
      if (newest === undefined || branch.Version.CompareTo(newest.Version) > 0) {
        newest = branch;
      }
    }
    return newest;
  }

  /**
   * Registers an already loaded version.
   *
   * @param payload - The version content; must belong to this package
   * @param parent - The parent version, or undefined for a root
   * @returns The new branch, or null when registration is deferred until the
   *   parent is registered
   * @throws DuplicateBranchError if the version is already registered
   */
  AddBranchVersion(payload: SchemaVersion, parent?: SchemaVersionNumber): SchemaBranch | null {
    if (payload.Package !== this.Package) {
      throw new StrataError(
        'VERSION_MISMATCH',
        `tried to add ${payload.Package} : ${payload.Version} to the ${this.Package} package`
      );
    }
    return this.register(payload.Version, parent, { Kind: 'loaded', Payload: payload });
  }

  /**
   * Registers a version whose content is loaded on first access.
   *
   * @returns The new branch, or null when registration is deferred
   * @throws DuplicateBranchError if the version is already registered
   */
  AddBranchLoader(
    loader: SchemaVersionLoader,
    version: SchemaVersionNumber,
    parent?: SchemaVersionNumber
  ): SchemaBranch | null {
    return this.register(version, parent, { Kind: 'lazy', Loader: loader, Version: version });
  }

  private register(
    version: SchemaVersionNumber,
    parent: SchemaVersionNumber | undefined,
    source: BranchSource
  ): SchemaBranch | null {
    if (this.Has(version) || this.isPending(version)) {
      throw new DuplicateBranchError(this.Package, version.toString());
    }

    if (parent !== undefined && !this.Has(parent)) {
      const waiting = this.pending.get(parent.Key);
      const entry: PendingRegistration = { Version: version, Parent: parent, Source: source };
      if (waiting) {
        waiting.push(entry);
      } else {
        this.pending.set(parent.Key, [entry]);
      }
      return null;
    }

    const branch = this.insert(parent, source);
    this.release(version);
    return branch;
  }

  private insert(parent: SchemaVersionNumber | undefined, source: BranchSource): SchemaBranch {
    const parentBranch = parent === undefined ? null : this.Get(parent) ?? null;
    const branch = new SchemaBranch(this.Package, parentBranch, source);
    this.branches.set(branch.Version.Key, branch);
    if (parentBranch === null) {
      this.roots.push(branch);
    }
    return branch;
  }

  /**
   * Inserts everything that was waiting on `version`, then everything waiting
   * on those, until nothing more can be released.
   */
  private release(version: SchemaVersionNumber): void {
    const worklist: SchemaVersionNumber[] = [version];
    let next = worklist.pop();
    while (next !== undefined) {
      const waiting = this.pending.get(next.Key);
      if (waiting) {
        this.pending.delete(next.Key);
        for (const entry of waiting) {
          const branch = this.insert(entry.Parent, entry.Source);
          worklist.push(branch.Version);
        }
      }
      next = worklist.pop();
    }
  }

  private isPending(version: SchemaVersionNumber): boolean {
    for (const waiting of this.pending.values()) {
      if (waiting.some((p) => p.Version.Equals(version))) {
        return true;
      }
    }
    return false;
  }
}

/**
 * @module core/strata
 * Main orchestrator for Strata operations.
 *
 * The `Strata` class is the primary public API for programmatic usage.
 * It loads packages from disk, analyzes their branches and turns the result
 * into plans an external generator can execute.
 *
 * @example
 * ```typescript
 * import { Strata } from '@strata/core';
 *
 * const strata = new Strata({ Sources: ['./schema/orders'] });
 * const plan = await strata.Plan();
 * for (const step of plan.Steps) {
 *   console.log(`${step.Action} ${step.ObjectType} ${step.Name}`);
 * }
 * ```
 */

import { StrataConfig, resolveConfig } from './config';
import { StrataError } from './errors';
import { Change } from '../model/change';
import { FormatProblemLocation, IsBlockingLevel, SchemaProblem } from '../model/problem';
import { SchemaObject, SchemaObjectType } from '../model/schema';
import { SqlForPlatform } from '../model/sql';
import { LoadedPackage, LoadPackage, ParseSourceSpec } from '../loader/package-loader';
import { UpgradeAnalysis } from '../upgrade/analysis';
import {
  BranchProblem,
  BranchUpgradeAnalysis,
  CreationOrder,
  FormatBranchProblem,
} from '../upgrade/branch-analysis';
import { IsUpgradeAnalysis, UpgradeStep } from '../upgrade/upgraded-set';
import { SchemaBranch } from '../version/branch';
import { CompareDecimals } from '../version/version-number';

/**
 * What a plan step does to its object.
 */
export type PlanAction = 'create' | 'add' | 'remove' | 'rename' | 'alter' | 'sql';

/**
 * One step of a plan.
 */
export interface PlanStep {
  Action: PlanAction;
  ObjectType: SchemaObjectType;

  /** Full name of the object; for stand-alone changes, the names they affect */
  Name: string;

  /** The object's Order, rendered `(a, b, c)` */
  Order: string;

  /** For raw SQL changes, the statement chosen for the configured platforms */
  Sql?: string;

  /** The analysis, change or object behind this step */
  Subject: UpgradeStep | SchemaObject;
}

/**
 * Result of a `Plan()` operation.
 */
export interface PlanResult {
  /** Package name */
  Package: string;

  /** The planned version; null when the package has no usable version */
  Version: string | null;

  /** The version upgraded from; null for a base plan */
  ParentVersion: string | null;

  /** False for a base (create from scratch) plan */
  IsUpgrade: boolean;

  /** Ordered steps */
  Steps: PlanStep[];

  /** Full names of the version's objects in creation order */
  CreationOrder: string[];

  /** Problems of the version, its parent and the diff */
  Problems: BranchProblem[];

  /** Problems found while assembling the package */
  PackageProblems: SchemaProblem[];

  /** Whether the plan can be generated (no blocking problems) */
  Success: boolean;

  /** Error message if planning failed */
  ErrorMessage?: string;
}

/**
 * Result of a `Base()` operation.
 */
export interface BaseResult {
  Package: string;

  /** The version created; null when the package has no usable version */
  Version: string | null;

  /** One `create` step per object, in creation order */
  Steps: PlanStep[];

  /** Problems found while reading the version */
  Problems: BranchProblem[];

  /** Whether the script can be generated (no blocking problems) */
  Success: boolean;

  /** Error message if the operation failed */
  ErrorMessage?: string;
}

/**
 * One version in an `Info()` report.
 */
export interface VersionInfo {
  Version: string;
  Parent: string | null;
  Children: string[];

  /** True for the package's newest version */
  Newest: boolean;
}

/**
 * Result of an `Info()` operation.
 */
export interface InfoResult {
  Package: string;

  /** Versions in version order */
  Versions: VersionInfo[];

  /** Parent versions that are referenced but missing */
  UnresolvedParents: string[];

  /** Versions waiting on a missing parent */
  PendingVersions: string[];
}

/**
 * Result of a `Validate()` operation.
 */
export interface ValidateResult {
  /** Whether all validations passed */
  Valid: boolean;

  /** Blocking problems, formatted */
  Errors: string[];

  /** Non-blocking problems, formatted */
  Warnings: string[];
}

/**
 * Callback interface for observing progress.
 */
export interface StrataCallbacks {
  /** Called when a branch is about to be analyzed */
  OnBranchStart?: (branch: SchemaBranch) => void;

  /** Called for informational log messages */
  OnLog?: (message: string) => void;
}

/**
 * The main Strata engine.
 *
 * - `LoadPackage()`: Assemble a package's version tree
 * - `Plan()`: Plan the upgrade to (or creation of) a version
 * - `Base()`: List a version's objects in creation order
 * - `Info()`: Report the version tree
 * - `Validate()`: Analyze every version and report problems
 */
export class Strata {
  private readonly config: Required<StrataConfig>;
  private callbacks: StrataCallbacks = {};

  constructor(config: StrataConfig) {
    this.config = resolveConfig(config);
  }

  /**
   * Registers callbacks for observing progress.
   * Returns `this` for chaining.
   */
  OnProgress(callbacks: StrataCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Loads a package directory into its version tree.
   *
   * @param source - Package directory (a trailing `@version` is ignored);
   *   defaults to the first configured source
   */
  async LoadPackage(source?: string): Promise<LoadedPackage> {
    const { Directory } = ParseSourceSpec(this.resolveSource(source));
    this.callbacks.OnLog?.(`Loading package from ${Directory}...`);
    const loaded = await LoadPackage(Directory, {
      FilePatterns: this.config.FilePatterns,
      ManifestFile: this.config.ManifestFile,
      OnWarning: (warning) => this.callbacks.OnLog?.(`Warning: ${warning}`),
    });
    this.callbacks.OnLog?.(`Found ${loaded.Package.Size} version(s) of ${loaded.Package.Package}`);
    return loaded;
  }

  /**
   * Plans the version named by the source (`dir@1.2`), or the newest
   * version. A version with a parent gets an upgrade plan; a root version
   * gets a base plan that creates every object.
   */
  async Plan(source?: string): Promise<PlanResult> {
    const result: PlanResult = {
      Package: '',
      Version: null,
      ParentVersion: null,
      IsUpgrade: false,
      Steps: [],
      CreationOrder: [],
      Problems: [],
      PackageProblems: [],
      Success: false,
    };

    try {
      const spec = ParseSourceSpec(this.resolveSource(source));
      const loaded = await this.LoadPackage(spec.Directory);
      const pkg = loaded.Package;
      result.Package = pkg.Package;
      result.PackageProblems = loaded.Problems;

      const branch = spec.Version === undefined ? pkg.NewestVersion() : pkg.FindVersion(spec.Version);
      if (!branch) {
        result.ErrorMessage = spec.Version === undefined
          ? `Package ${pkg.Package} has no versions`
          : `Version ${spec.Version} not found in package ${pkg.Package}`;
        return result;
      }

      this.callbacks.OnBranchStart?.(branch);
      const analysis = new BranchUpgradeAnalysis(branch);
      result.Version = branch.Version.toString();
      result.ParentVersion = branch.Parent?.Version.toString() ?? null;
      result.IsUpgrade = analysis.IsUpgrade;
      result.Problems = [...analysis.Problems];

      const creation = CreationOrder(analysis.CurrentVersion);
      result.CreationOrder = creation.map((obj) => obj.FullName);
      result.Steps = analysis.IsUpgrade
        ? analysis.Changes.flatMap((step) => this.toPlanSteps(step))
        : creation.map(createStep);

      this.callbacks.OnLog?.(
        `${result.Steps.length} step(s) planned for ${pkg.Package} : ${result.Version}`
      );

      result.Success =
        !analysis.HasBlockingProblems(this.config.TreatWarningsAsErrors) &&
        !loaded.Problems.some((p) => this.isBlocking(p.Level));
      return result;
    } catch (err) {
      result.Success = false;
      result.ErrorMessage = err instanceof Error ? err.message : String(err);
      return result;
    }
  }

  /**
   * Lists the objects of a version (the newest unless the source names one)
   * in creation order, for building that version from scratch. Unlike
   * `Plan()`, this ignores the parent version even when there is one.
   */
  async Base(source?: string): Promise<BaseResult> {
    const result: BaseResult = { Package: '', Version: null, Steps: [], Problems: [], Success: false };

    try {
      const spec = ParseSourceSpec(this.resolveSource(source));
      const { Package: pkg } = await this.LoadPackage(spec.Directory);
      result.Package = pkg.Package;

      const branch = spec.Version === undefined ? pkg.NewestVersion() : pkg.FindVersion(spec.Version);
      if (!branch) {
        result.ErrorMessage = spec.Version === undefined
          ? `Package ${pkg.Package} has no versions`
          : `Version ${spec.Version} not found in package ${pkg.Package}`;
        return result;
      }

      this.callbacks.OnBranchStart?.(branch);
      const version = branch.GetPayload();
      result.Version = version.Version.toString();
      result.Steps = CreationOrder(version).map(createStep);
      result.Problems = version.Problems.map((p): BranchProblem => ({
        Origin: 'current',
        Level: p.Level,
        Version: version.Version,
        Message: p.Message,
        Location: FormatProblemLocation(p),
      }));
      result.Success = !result.Problems.some((p) => this.isBlocking(p.Level));
      return result;
    } catch (err) {
      result.ErrorMessage = err instanceof Error ? err.message : String(err);
      return result;
    }
  }

  /**
   * Reports the version tree of a package.
   */
  async Info(source?: string): Promise<InfoResult> {
    const { Package: pkg } = await this.LoadPackage(source);
    const newest = pkg.NewestVersion();

    const versions = [...pkg.Branches]
      .sort((a, b) => CompareDecimals(a.Version, b.Version))
      .map((branch): VersionInfo => ({
        Version: branch.Version.toString(),
        Parent: branch.Parent?.Version.toString() ?? null,
        Children: branch.Children.map((c) => c.Version.toString()),
        Newest: branch === newest,
      }));

    return {
      Package: pkg.Package,
      Versions: versions,
      UnresolvedParents: pkg.UnresolvedBranchVersions.map(String),
      PendingVersions: pkg.PendingBranchVersions.map(String),
    };
  }

  /**
   * Analyzes every version of a package, collecting parse problems, diff
   * problems and order cycles.
   */
  async Validate(source?: string): Promise<ValidateResult> {
    const loaded = await this.LoadPackage(source);
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const problem of loaded.Problems) {
      const text = `${problem.Message} [${FormatProblemLocation(problem)}]`;
      (this.isBlocking(problem.Level) ? errors : warnings).push(text);
    }

    const versions = loaded.Package.Versions();
    for (const version of versions) {
      const branch = loaded.Package.Get(version);
      if (!branch) {
        continue;
      }
      this.callbacks.OnBranchStart?.(branch);
      this.callbacks.OnLog?.(`Analyzing ${branch.Package} : ${branch.Version}`);
      try {
        const analysis = new BranchUpgradeAnalysis(branch);
        const stepCount = analysis.IsUpgrade
          ? analysis.Changes.length
          : CreationOrder(analysis.CurrentVersion).length;
        this.callbacks.OnLog?.(`${stepCount} step(s) in ${branch.Version}`);
        for (const problem of analysis.Problems) {
          if (problem.Origin === 'parent') {
            continue;
          }
          (this.isBlocking(problem.Level) ? errors : warnings).push(FormatBranchProblem(problem));
        }
      } catch (err) {
        if (!(err instanceof StrataError)) {
          throw err;
        }
        errors.push(`(${branch.Version}) ${err.message}`);
      }
    }

    return {
      Valid: errors.length === 0,
      Errors: errors,
      Warnings: warnings,
    };
  }

  private resolveSource(source: string | undefined): string {
    const resolved = source ?? this.config.Sources[0];
    if (resolved === undefined) {
      throw new StrataError('NO_SOURCE', 'No package source configured');
    }
    return resolved;
  }

  private isBlocking(level: SchemaProblem['Level']): boolean {
    return IsBlockingLevel(level) || (this.config.TreatWarningsAsErrors && level === 'warning');
  }

  private toPlanSteps(step: UpgradeStep): PlanStep[] {
    if (IsUpgradeAnalysis(step)) {
      return step.HasChanges() ? [analysisStep(step)] : [];
    }
    return [this.changeStep(step)];
  }

  private changeStep(change: Change): PlanStep {
    const names = change.Type === 'schema-change' && change.PreviousName !== undefined
      ? [change.PreviousName]
      : change.Affects;
    return {
      Action: change.ChangeType,
      ObjectType: change.ObjectType,
      Name: names.join(', '),
      Order: change.Order.toString(),
      Sql: change.Type === 'sql-change' ? SqlForPlatform(change.Sql, this.config.Platforms)?.Sql : undefined,
      Subject: change,
    };
  }
}

function createStep(obj: SchemaObject): PlanStep {
  return {
    Action: 'create',
    ObjectType: obj.Type,
    Name: obj.FullName,
    Order: obj.Order.toString(),
    Subject: obj,
  };
}

function analysisStep(analysis: UpgradeAnalysis): PlanStep {
  let action: PlanAction;
  if (analysis.IsAddition) {
    action = 'add';
  } else if (analysis.IsRemoval) {
    action = 'remove';
  } else if (analysis.ChangeCategories.rename.length > 0) {
    action = 'rename';
  } else {
    action = 'alter';
  }
  return {
    Action: action,
    ObjectType: analysis.Kind,
    Name: analysis.Name,
    Order: analysis.Order.toString(),
    Subject: analysis,
  };
}

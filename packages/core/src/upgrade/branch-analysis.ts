/**
 * @module upgrade/branch-analysis
 * The upgrade from a branch's parent version to the branch's own version.
 */

import { FormatProblemLocation, IsBlockingLevel, ProblemLevel, SchemaProblem } from '../model/problem';
import { SchemaEntity, SchemaObject } from '../model/schema';
import { SortByOrder } from '../order/order';
import { SchemaBranch, SchemaVersion } from '../version/branch';
import { SchemaVersionNumber } from '../version/version-number';
import { DescribeEntity, UpgradeAnalysisProblem } from './problem';
import { SchemaUpgradedSet, UpgradeStep } from './upgraded-set';

/**
 * Where a branch problem came from: the current version's files, the parent
 * version's files, or the diff between them.
 */
export type ProblemOrigin = 'current' | 'parent' | 'upgrade';

/**
 * A problem found while analyzing a branch, tagged with its origin and the
 * version it belongs to.
 */
export interface BranchProblem {
  Origin: ProblemOrigin;
  Level: ProblemLevel;
  Version: SchemaVersionNumber;
  Message: string;

  /** File and position, or the object or change the problem is about */
  Location: string;
}

/**
 * Renders a branch problem as `(version) message [location]`.
 */
export function FormatBranchProblem(problem: BranchProblem): string {
  return `(${problem.Version}) ${problem.Message} [${problem.Location}]`;
}

/**
 * The objects of a version in creation order, for building the version from
 * scratch.
 */
export function CreationOrder(version: SchemaVersion): SchemaObject[] {
  return SortByOrder(version.Schema);
}

/**
 * Analysis of one branch. A branch without a parent is not an upgrade: it
 * has no diff, and {@link CreationOrder} gives its objects instead.
 *
 * Resolving the payloads of the branch and its parent happens in the
 * constructor, so a lazily loaded branch is read here.
 */
export class BranchUpgradeAnalysis {
  readonly Branch: SchemaBranch;
  readonly CurrentVersion: SchemaVersion;
  readonly PreviousVersion: SchemaVersion | null;

  /** The diff, or null when the branch has no parent */
  readonly UpgradeSet: SchemaUpgradedSet | null;

  readonly Problems: readonly BranchProblem[];

  constructor(branch: SchemaBranch) {
    this.Branch = branch;
    this.CurrentVersion = branch.GetPayload();
    this.PreviousVersion = branch.Parent?.GetPayload() ?? null;

    const problems = schemaProblems('current', this.CurrentVersion);

    if (this.PreviousVersion !== null) {
      problems.push(...schemaProblems('parent', this.PreviousVersion));

      const afterList: SchemaEntity[] = [...this.CurrentVersion.TopChanges, ...this.CurrentVersion.Schema];
      this.UpgradeSet = new SchemaUpgradedSet(this.PreviousVersion.Schema, afterList);
      problems.push(...upgradeProblems('error', this.CurrentVersion.Version, this.UpgradeSet.Errors));
      problems.push(...upgradeProblems('warning', this.CurrentVersion.Version, this.UpgradeSet.Warnings));
    } else {
      this.UpgradeSet = null;
    }

    this.Problems = problems;
  }

  get IsUpgrade(): boolean {
    return this.UpgradeSet !== null;
  }

  /**
   * The ordered upgrade steps; empty when this is not an upgrade.
   */
  get Changes(): readonly UpgradeStep[] {
    return this.UpgradeSet?.AllUpgrades ?? [];
  }

  /**
   * True when any problem should stop generation: fatal or error problems,
   * and warnings too when `treatWarningsAsErrors` is set.
   */
  HasBlockingProblems(treatWarningsAsErrors: boolean = false): boolean {
    return this.Problems.some(
      (p) => IsBlockingLevel(p.Level) || (treatWarningsAsErrors && p.Level === 'warning')
    );
  }
}

function schemaProblems(origin: ProblemOrigin, version: SchemaVersion): BranchProblem[] {
  return version.Problems.map((p: SchemaProblem): BranchProblem => ({
    Origin: origin,
    Level: p.Level,
    Version: version.Version,
    Message: p.Message,
    Location: FormatProblemLocation(p),
  }));
}

function upgradeProblems(
  level: ProblemLevel,
  version: SchemaVersionNumber,
  problems: readonly UpgradeAnalysisProblem[]
): BranchProblem[] {
  return problems.map((p): BranchProblem => ({
    Origin: 'upgrade',
    Level: level,
    Version: version,
    Message: p.Message,
    Location: DescribeEntity(p.Subject),
  }));
}

/**
 * @module @strata/core
 *
 * Strata: schema version tracking and upgrade planning from declarative,
 * versioned schema descriptions.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Strata } from '@strata/core';
 *
 * const strata = new Strata({
 *   Sources: ['./schema/orders'],
 *   Platforms: ['postgresql'],
 * });
 *
 * const plan = await strata.Plan('./schema/orders@2');
 * if (!plan.Success) {
 *   console.error(plan.ErrorMessage ?? `${plan.Problems.length} problem(s)`);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { Strata } from './core/strata';
export type {
  PlanAction,
  BaseResult,
  PlanStep,
  PlanResult,
  VersionInfo,
  InfoResult,
  ValidateResult,
  StrataCallbacks,
} from './core/strata';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveConfig } from './core/config';
export type { StrataConfig } from './core/config';

// ─── Ordering ────────────────────────────────────────────────────────
export { Order, CompareSortNodes, SortByOrder } from './order/order';
export type { OrderConstraints, SortNode } from './order/order';

// ─── Schema Model ────────────────────────────────────────────────────
export {
  CHANGE_TYPES,
  CreateSchemaChange,
  CreateSqlChange,
  IsChange,
  IsRemoveChange,
  CategorizeChanges,
} from './model/change';
export type {
  ChangeType,
  PlainSchemaChange,
  NamedSchemaChange,
  SchemaChange,
  RemoveChange,
  SqlChange,
  Change,
  SchemaChangeOptions,
  SqlChangeOptions,
  ChangeCategories,
} from './model/change';
export {
  SCHEMA_OBJECT_TYPES,
  CONSTRAINT_TYPES,
  CreateFullName,
  NormalizeConstraintType,
  IsSchemaObject,
  IsColumnar,
  ConstraintsOf,
  SubSchema,
  OwnChanges,
  ColumnChanges,
  HasAnyChanges,
  CreateTable,
  CreateView,
  CreateColumn,
  CreateConstraint,
} from './model/schema';
export type {
  SchemaObjectType,
  Constraint,
  Column,
  Table,
  View,
  ColumnarSchemaObject,
  SchemaObject,
  SchemaEntity,
  TableOptions,
  ViewOptions,
  ColumnOptions,
  ConstraintOptions,
} from './model/schema';
export { CreateSqlStatement, UniversalSql, SqlForPlatform } from './model/sql';
export type { SqlStatement, SqlSet } from './model/sql';
export { FormatProblemLocation, IsBlockingLevel } from './model/problem';
export type { ProblemLevel, SchemaProblem } from './model/problem';

// ─── Versions ────────────────────────────────────────────────────────
export { SchemaVersionNumber, CompareVersions, CompareDecimals } from './version/version-number';
export { SchemaBranch, CreateSchemaVersion } from './version/branch';
export type { SchemaVersion, SchemaVersionLoader, BranchSource } from './version/branch';
export { SchemaPackage } from './version/package';

// ─── Upgrade Analysis ────────────────────────────────────────────────
export {
  UpgradeAnalysis,
  ColumnarUpgradeAnalysis,
  TableUpgradeAnalysis,
  ViewUpgradeAnalysis,
  ColumnUpgradeAnalysis,
  ConstraintUpgradeAnalysis,
  CreateUpgradeAnalysis,
} from './upgrade/analysis';
export type { UpgradeTarget } from './upgrade/analysis';
export { SchemaUpgradedSet, IsUpgradeAnalysis } from './upgrade/upgraded-set';
export type { UpgradeStep } from './upgrade/upgraded-set';
export { CreateUpgradeProblem, DescribeEntity, FormatUpgradeProblem } from './upgrade/problem';
export type { UpgradeAnalysisProblem } from './upgrade/problem';
export {
  BranchUpgradeAnalysis,
  CreationOrder,
  FormatBranchProblem,
} from './upgrade/branch-analysis';
export type { ProblemOrigin, BranchProblem } from './upgrade/branch-analysis';

// ─── Loader ──────────────────────────────────────────────────────────
export {
  DEFAULT_FILE_PATTERNS,
  DEFAULT_MANIFEST_FILE,
  LoadPackage,
  LoadVersionDirectory,
  ParseSourceSpec,
} from './loader/package-loader';
export type {
  LoadPackageOptions,
  LoadedPackage,
  LoadVersionOptions,
  SourceSpec,
} from './loader/package-loader';
export { ParseVersionDirectoryName, ReadManifest } from './loader/version-directory';
export type { VersionDirectoryName, VersionManifest } from './loader/version-directory';
export { ParseSchemaDocument, ReadSchemaDocument } from './loader/document';
export type { ParsedDocument } from './loader/document';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  StrataError,
  InvalidOrderError,
  CyclicOrderError,
  DuplicateBranchError,
  UnknownSchemaKindError,
  LoadError,
} from './core/errors';

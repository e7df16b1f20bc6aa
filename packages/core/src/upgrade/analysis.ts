/**
 * @module upgrade/analysis
 * The diff of one schema object between two versions.
 *
 * An analysis is always typed by the object being upgraded *to*: a table
 * whose previous version was a view produces a {@link TableUpgradeAnalysis}
 * carrying a "cannot upgrade directly" error. When the object is removed,
 * the analysis is typed by the object being removed.
 */

import { StrataError, UnknownSchemaKindError } from '../core/errors';
import {
  CategorizeChanges,
  Change,
  ChangeCategories,
  IsChange,
  RemoveChange,
} from '../model/change';
import {
  ColumnChanges,
  ConstraintsOf,
  IsColumnar,
  OwnChanges,
  SchemaEntity,
  SchemaObject,
  SchemaObjectType,
} from '../model/schema';
import { Order } from '../order/order';
import { CreateUpgradeProblem, UpgradeAnalysisProblem } from './problem';
import { SchemaUpgradedSet } from './upgraded-set';

/**
 * The "after" side of an analysis: the new version of the object, or the
 * remove change that deletes it.
 */
export type UpgradeTarget = SchemaObject | RemoveChange;

/**
 * Base class for all upgrade analyses.
 */
export abstract class UpgradeAnalysis {
  /** The kind of object this analysis upgrades to (or removes) */
  readonly Kind: SchemaObjectType;

  /** The object in the previous version; undefined for a new object */
  readonly Before: SchemaObject | undefined;

  /** The object in this version, the remove change, or undefined for an implicit removal */
  readonly After: UpgradeTarget | undefined;

  /** The top-level authored changes, grouped by change type */
  readonly ChangeCategories: ChangeCategories;

  /**
   * Diff of the object's constraints. Errors and warnings from this set are
   * copied into this analysis.
   */
  readonly ConstraintChanges: SchemaUpgradedSet;

  protected readonly errors: UpgradeAnalysisProblem[] = [];
  protected readonly warnings: UpgradeAnalysisProblem[] = [];

  private readonly subject: SchemaEntity;

  /**
   * @throws StrataError (`INVALID_UPGRADE`) when both sides are undefined
   */
  protected constructor(
    kind: SchemaObjectType,
    before: SchemaObject | undefined,
    after: UpgradeTarget | undefined
  ) {
    const subject = after ?? before;
    if (subject === undefined) {
      throw new StrataError('INVALID_UPGRADE', 'an upgrade needs a previous or a current object');
    }
    this.Kind = kind;
    this.Before = before;
    this.After = after;
    this.subject = subject;

    const changes: Change[] = [];
    if (after === undefined) {
      this.warnings.push(CreateUpgradeProblem(subject, 'implicit removal of object'));
    } else if (IsChange(after)) {
      changes.push(after);
    } else {
      changes.push(...OwnChanges(after));
    }
    this.ChangeCategories = CategorizeChanges(changes);

    const afterConstraints = after === undefined || IsChange(after) ? [] : ConstraintsOf(after);
    this.ConstraintChanges = new SchemaUpgradedSet(
      before === undefined ? [] : ConstraintsOf(before),
      afterConstraints
    );

    this.checkChangeCounts();

    if (before !== undefined && before.Type !== kind) {
      this.errors.push(
        CreateUpgradeProblem(before, `cannot upgrade directly from a ${before.Type} to a ${kind}`)
      );
    }

    this.errors.push(...this.ConstraintChanges.Errors);
    this.warnings.push(...this.ConstraintChanges.Warnings);
  }

  get Errors(): readonly UpgradeAnalysisProblem[] {
    return this.errors;
  }

  get Warnings(): readonly UpgradeAnalysisProblem[] {
    return this.warnings;
  }

  /**
   * Full name of the object: the current name, or the previous one when the
   * object is removed.
   */
  get Name(): string {
    const after = this.After;
    if (after === undefined) {
      return this.Before?.FullName ?? '';
    }
    if (IsChange(after)) {
      return this.Before?.FullName ?? after.PreviousName;
    }
    return after.FullName;
  }

  /**
   * Sequencing key: the after side's Order, or the before side's when the
   * object is removed implicitly.
   */
  get Order(): Order {
    return this.subject.Order;
  }

  /** True when the object does not exist in the previous version */
  get IsAddition(): boolean {
    return this.Before === undefined;
  }

  /** True when the object does not survive into this version */
  get IsRemoval(): boolean {
    return this.After === undefined || IsChange(this.After);
  }

  /**
   * True when anything needs doing: authored changes, an implicit add or
   * removal, or changes among the constraints.
   */
  HasChanges(): boolean {
    if (this.Before === undefined || this.After === undefined) {
      return true;
    }
    const c = this.ChangeCategories;
    const authored = c.add.length + c.remove.length + c.rename.length + c.alter.length + c.sql.length;
    return authored > 0 || this.ConstraintChanges.HasChanges();
  }

  private checkChangeCounts(): void {
    const c = this.ChangeCategories;
    let bigChangeCount = 0;
    for (const kind of ['add', 'remove', 'rename'] as const) {
      const count = c[kind].length;
      bigChangeCount += count;
      if (count > 1) {
        this.errors.push(CreateUpgradeProblem(this.subject, `at most 1 ${kind} is allowed`));
      }
    }

    if (bigChangeCount > 1 || (bigChangeCount > 0 && c.alter.length + c.sql.length > 0)) {
      this.errors.push(
        CreateUpgradeProblem(
          this.subject,
          'at most 1 of an add, remove, or rename is allowed, and it cannot be done with an alter or sql change'
        )
      );
    }

    if (this.Before === undefined) {
      if (c.add.length === 0) {
        this.warnings.push(CreateUpgradeProblem(this.subject, 'implicit add'));
      }
      if (c.remove.length > 0 || c.rename.length > 0 || c.alter.length > 0) {
        this.errors.push(
          CreateUpgradeProblem(this.subject, 'can only add due to no previous version found')
        );
      }
    }
  }
}

/**
 * Shared analysis for tables and views: adds the column diff.
 */
export abstract class ColumnarUpgradeAnalysis extends UpgradeAnalysis {
  /**
   * Diff of the columns, or null unless both sides are tables or views.
   * Errors and warnings from this set are copied into this analysis.
   */
  readonly ColumnChanges: SchemaUpgradedSet | null;

  protected constructor(
    kind: 'table' | 'view',
    before: SchemaObject | undefined,
    after: UpgradeTarget | undefined
  ) {
    super(kind, before, after);

    if (
      before !== undefined && IsColumnar(before) &&
      after !== undefined && !IsChange(after) && IsColumnar(after)
    ) {
      const columns = new SchemaUpgradedSet(before.Columns, [
        ...after.Columns,
        ...ColumnChanges(after),
      ]);
      for (const change of columns.StandAloneChanges) {
        // A column change not attached to a column only makes sense as raw SQL
        if (change.Type !== 'sql-change') {
          this.errors.push(CreateUpgradeProblem(change, 'invalid columnar change'));
        }
      }
      this.errors.push(...columns.Errors);
      this.warnings.push(...columns.Warnings);
      this.ColumnChanges = columns;
    } else {
      this.ColumnChanges = null;
    }
  }

  HasChanges(): boolean {
    return super.HasChanges() || (this.ColumnChanges?.HasChanges() ?? false);
  }
}

export class TableUpgradeAnalysis extends ColumnarUpgradeAnalysis {
  constructor(before: SchemaObject | undefined, after: UpgradeTarget | undefined) {
    super('table', before, after);
  }
}

export class ViewUpgradeAnalysis extends ColumnarUpgradeAnalysis {
  constructor(before: SchemaObject | undefined, after: UpgradeTarget | undefined) {
    super('view', before, after);
  }
}

export class ColumnUpgradeAnalysis extends UpgradeAnalysis {
  constructor(before: SchemaObject | undefined, after: UpgradeTarget | undefined) {
    super('column', before, after);
  }
}

export class ConstraintUpgradeAnalysis extends UpgradeAnalysis {
  constructor(before: SchemaObject | undefined, after: UpgradeTarget | undefined) {
    super('constraint', before, after);
  }
}

/**
 * Builds the analysis matching the kind of the current object, or of the
 * previous object when there is no current one.
 *
 * @throws StrataError (`INVALID_UPGRADE`) when both sides are undefined
 * @throws UnknownSchemaKindError for a value outside the schema object variants
 */
export function CreateUpgradeAnalysis(
  before: SchemaObject | undefined,
  after: UpgradeTarget | undefined
): UpgradeAnalysis {
  const target = after !== undefined && !IsChange(after) ? after : before;
  if (target === undefined) {
    throw new StrataError('INVALID_UPGRADE', 'an upgrade needs a previous or a current object');
  }

  switch (target.Type) {
    case 'table':
      return new TableUpgradeAnalysis(before, after);
    case 'view':
      return new ViewUpgradeAnalysis(before, after);
    case 'column':
      return new ColumnUpgradeAnalysis(before, after);
    case 'constraint':
      return new ConstraintUpgradeAnalysis(before, after);
    default:
      throw new UnknownSchemaKindError(describeKind(target));
  }
}

function describeKind(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'Type' in value) {
    return String(value.Type);
  }
  return typeof value;
}

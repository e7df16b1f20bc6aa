/**
 * @module model/schema
 * The schema objects of one version: tables, views, their columns and
 * constraints.
 *
 * The variant set is closed and discriminated by `Type`, so code that
 * handles every kind of object can `switch` over it exhaustively.
 */

import { Order } from '../order/order';
import { StrataError } from '../core/errors';
import { Change } from './change';
import { SqlSet } from './sql';

/**
 * The kinds of schema object.
 */
export type SchemaObjectType = 'table' | 'view' | 'column' | 'constraint';

/** All schema object kinds */
export const SCHEMA_OBJECT_TYPES: readonly SchemaObjectType[] = ['table', 'view', 'column', 'constraint'];

/**
 * Fields shared by every schema object.
 */
interface SchemaObjectBase {
  /** Simple name */
  readonly Name: string;

  /** Unique name within its list; the key used to match objects across versions */
  readonly FullName: string;

  readonly Order: Order;

  readonly Comment?: string;

  /**
   * Changes that upgrade this object from the previous version. Empty when
   * nothing changed or when the object is new.
   */
  readonly Changes: readonly Change[];
}

/**
 * All recognized constraint types, in normalized form
 * (see {@link NormalizeConstraintType}).
 */
export const CONSTRAINT_TYPES: readonly string[] = [
  'key',
  'primarykey',
  'fulltextkey',
  'uniquekey',
  'spatialkey',
  'foreignkey',
  'uniqueindex',
  'index',
  'primaryindex',
  'fulltextindex',
  'spatialindex',
  'codeindex',
  'codeforeignkey',
  'initialvalue',
  'noupdate',
  'notread',
  'constantquery',
  'constantupdate',
  'updatevalue',
  'restrictquery',
  'notnull',
  'nullable',
  'validatewrite',
  'validate',
  'valuerestriction',
  'createrestriction',
  'updaterestriction',
  'updaterequired',
  'requiredupdate',
  'removed',
];

/**
 * A limitation on a column or a columnar object, enforced by SQL or by code.
 */
export interface Constraint extends SchemaObjectBase {
  readonly Type: 'constraint';

  /** Normalized constraint type, one of {@link CONSTRAINT_TYPES} */
  readonly ConstraintType: string;

  /** Explicit constraint name, if the author gave one */
  readonly ConstraintName?: string;

  readonly ColumnNames: readonly string[];

  /** Additional free-form information about the constraint */
  readonly Details: Readonly<Record<string, unknown>>;

  /** SQL implementing the constraint, when it lives in the database */
  readonly Sql?: SqlSet;
}

/**
 * A column of a table or view.
 */
export interface Column extends SchemaObjectBase {
  readonly Type: 'column';

  /** Abstract value type (e.g. `int`, `nvarchar(255)`) */
  readonly ValueType: string;

  /** Platform data type; defaults to the value type */
  readonly DataType: string;

  readonly AutoIncrement: boolean;

  readonly DefaultValue?: string;

  readonly Remarks?: string;

  readonly Constraints: readonly Constraint[];
}

/**
 * Fields shared by tables and views.
 */
interface ColumnarBase extends SchemaObjectBase {
  readonly CatalogName?: string;
  readonly SchemaName?: string;
  readonly Columns: readonly Column[];
  readonly Constraints: readonly Constraint[];
}

export interface Table extends ColumnarBase {
  readonly Type: 'table';
  readonly TableSpace?: string;
}

export interface View extends ColumnarBase {
  readonly Type: 'view';

  /** The query defining the view */
  readonly SelectQuery: SqlSet;

  readonly ReplaceIfExists: boolean;
}

/**
 * An object with columns.
 */
export type ColumnarSchemaObject = Table | View;

/**
 * Any schema object.
 */
export type SchemaObject = Table | View | Column | Constraint;

/**
 * Anything that can appear in a version's "after" list: an object or an
 * authored change.
 */
export type SchemaEntity = SchemaObject | Change;

/**
 * Joins the defined name parts with `.`.
 *
 * @example CreateFullName(undefined, 'sales', 'PRICE') === 'sales.PRICE'
 */
export function CreateFullName(...parts: (string | undefined)[]): string {
  return parts.filter((p): p is string => p !== undefined && p.length > 0).join('.');
}

/**
 * Strips whitespace, underscores and dashes from a constraint type and
 * lower-cases it, so `'Primary Key'` and `'primary_key'` both become
 * `'primarykey'`.
 */
export function NormalizeConstraintType(raw: string): string {
  return raw.replace(/[\s_-]/g, '').toLowerCase();
}

export function IsSchemaObject(value: SchemaEntity): value is SchemaObject {
  return value.Type === 'table' || value.Type === 'view' || value.Type === 'column' || value.Type === 'constraint';
}

export function IsColumnar(value: SchemaEntity): value is ColumnarSchemaObject {
  return value.Type === 'table' || value.Type === 'view';
}

/**
 * Constraints attached directly to an object (none for a constraint).
 */
export function ConstraintsOf(obj: SchemaObject): readonly Constraint[] {
  return obj.Type === 'constraint' ? [] : obj.Constraints;
}

/**
 * The nested objects of an object: columns then constraints for tables and
 * views, constraints for columns.
 */
export function SubSchema(obj: SchemaObject): readonly SchemaObject[] {
  switch (obj.Type) {
    case 'table':
    case 'view':
      return [...obj.Columns, ...obj.Constraints];
    case 'column':
      return obj.Constraints;
    case 'constraint':
      return [];
  }
}

/**
 * The object's changes that apply to the object itself. For tables and views
 * this excludes column-scoped changes, which belong to the column diff.
 */
export function OwnChanges(obj: SchemaObject): readonly Change[] {
  if (IsColumnar(obj)) {
    return obj.Changes.filter((c) => c.ObjectType !== 'column');
  }
  return obj.Changes;
}

/**
 * Column-scoped changes carried on a table or view.
 */
export function ColumnChanges(obj: ColumnarSchemaObject): readonly Change[] {
  return obj.Changes.filter((c) => c.ObjectType === 'column');
}

/**
 * Recursively checks whether the object or any nested object carries changes.
 */
export function HasAnyChanges(obj: SchemaObject): boolean {
  if (obj.Changes.length > 0) {
    return true;
  }
  return SubSchema(obj).some(HasAnyChanges);
}

// ─── Factories ───────────────────────────────────────────────────────

/**
 * Options shared by every factory below.
 */
interface ObjectOptions {
  Name: string;
  Order: Order;
  Comment?: string;
  Changes?: readonly Change[];
}

export interface TableOptions extends ObjectOptions {
  CatalogName?: string;
  SchemaName?: string;
  TableSpace?: string;
  Columns?: readonly Column[];
  Constraints?: readonly Constraint[];
}

export function CreateTable(options: TableOptions): Table {
  return {
    Type: 'table',
    Name: options.Name,
    FullName: CreateFullName(options.CatalogName, options.SchemaName, options.Name),
    Order: options.Order,
    Comment: options.Comment,
    Changes: options.Changes ?? [],
    CatalogName: options.CatalogName,
    SchemaName: options.SchemaName,
    TableSpace: options.TableSpace,
    Columns: options.Columns ?? [],
    Constraints: options.Constraints ?? [],
  };
}

export interface ViewOptions extends ObjectOptions {
  CatalogName?: string;
  SchemaName?: string;
  SelectQuery: SqlSet;
  ReplaceIfExists?: boolean;
  Columns?: readonly Column[];
  Constraints?: readonly Constraint[];
}

export function CreateView(options: ViewOptions): View {
  return {
    Type: 'view',
    Name: options.Name,
    FullName: CreateFullName(options.CatalogName, options.SchemaName, options.Name),
    Order: options.Order,
    Comment: options.Comment,
    Changes: options.Changes ?? [],
    CatalogName: options.CatalogName,
    SchemaName: options.SchemaName,
    SelectQuery: options.SelectQuery,
    ReplaceIfExists: options.ReplaceIfExists ?? true,
    Columns: options.Columns ?? [],
    Constraints: options.Constraints ?? [],
  };
}

export interface ColumnOptions extends ObjectOptions {
  ValueType: string;
  DataType?: string;
  AutoIncrement?: boolean;
  DefaultValue?: string;
  Remarks?: string;
  Constraints?: readonly Constraint[];
}

export function CreateColumn(options: ColumnOptions): Column {
  return {
    Type: 'column',
    Name: options.Name,
    FullName: options.Name,
    Order: options.Order,
    Comment: options.Comment,
    Changes: options.Changes ?? [],
    ValueType: options.ValueType,
    DataType: options.DataType ?? options.ValueType,
    AutoIncrement: options.AutoIncrement ?? false,
    DefaultValue: options.DefaultValue,
    Remarks: options.Remarks,
    Constraints: options.Constraints ?? [],
  };
}

export interface ConstraintOptions {
  ConstraintType: string;
  Order: Order;
  ConstraintName?: string;
  ColumnNames?: readonly string[];
  Details?: Readonly<Record<string, unknown>>;
  Sql?: SqlSet;
  Comment?: string;
  Changes?: readonly Change[];
}

/**
 * Builds a constraint. An unnamed constraint is matched across versions by
 * its type and columns, e.g. `notnull(Price)`.
 *
 * @throws StrataError (`INVALID_CONSTRAINT`) for an unrecognized type
 */
export function CreateConstraint(options: ConstraintOptions): Constraint {
  const constraintType = NormalizeConstraintType(options.ConstraintType);
  if (!CONSTRAINT_TYPES.includes(constraintType)) {
    throw new StrataError(
      'INVALID_CONSTRAINT',
      `invalid constraint type '${options.ConstraintType}'`
    );
  }
  const columnNames = options.ColumnNames ?? [];
  return {
    Type: 'constraint',
    Name: options.ConstraintName ?? constraintType,
    FullName: options.ConstraintName ?? `${constraintType}(${columnNames.join(',')})`,
    Order: options.Order,
    Comment: options.Comment,
    Changes: options.Changes ?? [],
    ConstraintType: constraintType,
    ConstraintName: options.ConstraintName,
    ColumnNames: columnNames,
    Details: options.Details ?? {},
    Sql: options.Sql,
  };
}

/**
 * @module model/change
 * Authored changes: the deltas that move an object from the previous schema
 * version to the current one.
 *
 * A change is either a simple {@link SchemaChange} (add, remove, rename,
 * alter) that the generator knows how to express, or an explicit
 * {@link SqlChange}. Remove and rename changes name the object they act on
 * through `PreviousName`.
 */

import { Order } from '../order/order';
import { StrataError } from '../core/errors';
import { SqlSet } from './sql';
import { SchemaObjectType } from './schema';

/**
 * The kind of change being performed.
 */
export type ChangeType = 'add' | 'remove' | 'rename' | 'alter' | 'sql';

/** All change types, in categorization order */
export const CHANGE_TYPES: readonly ChangeType[] = ['add', 'remove', 'rename', 'alter', 'sql'];

/**
 * Fields shared by every change.
 */
interface ChangeBase {
  /** Sequencing key */
  readonly Order: Order;

  /** Free-form author comment */
  readonly Comment?: string;

  /** The kind of schema object this change applies to */
  readonly ObjectType: SchemaObjectType;

  /**
   * Names of the objects this change impacts. For remove and rename changes
   * the previous name is always included.
   */
  readonly Affects: readonly string[];
}

/**
 * An add or alter change. These never carry a previous name.
 */
export interface PlainSchemaChange extends ChangeBase {
  readonly Type: 'schema-change';
  readonly ChangeType: 'add' | 'alter';
  readonly PreviousName?: undefined;
}

/**
 * A remove or rename change, acting on the object previously named
 * `PreviousName`.
 */
export interface NamedSchemaChange extends ChangeBase {
  readonly Type: 'schema-change';
  readonly ChangeType: 'remove' | 'rename';
  readonly PreviousName: string;
}

/**
 * A simple change that needs no explicit SQL.
 */
export type SchemaChange = PlainSchemaChange | NamedSchemaChange;

/**
 * A remove change; used as the "after" side of an explicit removal.
 */
export type RemoveChange = NamedSchemaChange & { readonly ChangeType: 'remove' };

/**
 * An explicit set of SQL instructions that performs the change.
 */
export interface SqlChange extends ChangeBase {
  readonly Type: 'sql-change';
  readonly ChangeType: 'sql';
  readonly Sql: SqlSet;
}

/**
 * Any authored change.
 */
export type Change = SchemaChange | SqlChange;

/**
 * Options accepted by {@link CreateSchemaChange}.
 */
export interface SchemaChangeOptions {
  Order: Order;
  ObjectType: SchemaObjectType;
  ChangeType: 'add' | 'remove' | 'rename' | 'alter';
  PreviousName?: string;
  Affects?: readonly string[];
  Comment?: string;
}

/**
 * Builds a {@link SchemaChange}, enforcing that a previous name is given
 * exactly for remove and rename changes.
 *
 * @throws StrataError (`INVALID_CHANGE`) when the previous name rule is broken
 */
export function CreateSchemaChange(options: SchemaChangeOptions): SchemaChange {
  const affects = [...(options.Affects ?? [])];
  const base = {
    Type: 'schema-change' as const,
    Order: options.Order,
    Comment: options.Comment,
    ObjectType: options.ObjectType,
  };

  switch (options.ChangeType) {
    case 'remove':
    case 'rename': {
      const previousName = options.PreviousName;
      if (previousName === undefined || previousName.length === 0) {
        throw new StrataError(
          'INVALID_CHANGE',
          `a ${options.ChangeType} change requires a previous name`
        );
      }
      if (!affects.includes(previousName)) {
        affects.push(previousName);
      }
      return { ...base, ChangeType: options.ChangeType, PreviousName: previousName, Affects: affects };
    }
    case 'add':
    case 'alter':
      if (options.PreviousName !== undefined) {
        throw new StrataError(
          'INVALID_CHANGE',
          `a ${options.ChangeType} change cannot have a previous name`
        );
      }
      return { ...base, ChangeType: options.ChangeType, Affects: affects };
  }
}

/**
 * Options accepted by {@link CreateSqlChange}.
 */
export interface SqlChangeOptions {
  Order: Order;
  ObjectType: SchemaObjectType;
  Sql: SqlSet;
  Affects?: readonly string[];
  Comment?: string;
}

/**
 * Builds a {@link SqlChange}.
 *
 * @throws StrataError (`INVALID_CHANGE`) when the SQL set is empty
 */
export function CreateSqlChange(options: SqlChangeOptions): SqlChange {
  if (options.Sql.Statements.length === 0) {
    throw new StrataError('INVALID_CHANGE', 'a sql change requires at least one statement');
  }
  return {
    Type: 'sql-change',
    ChangeType: 'sql',
    Order: options.Order,
    Comment: options.Comment,
    ObjectType: options.ObjectType,
    Affects: [...(options.Affects ?? [])],
    Sql: options.Sql,
  };
}

export function IsChange(value: { readonly Type: string }): value is Change {
  return value.Type === 'schema-change' || value.Type === 'sql-change';
}

export function IsRemoveChange(change: Change): change is RemoveChange {
  return change.Type === 'schema-change' && change.ChangeType === 'remove';
}

/**
 * Changes grouped by their change type.
 */
export type ChangeCategories = Record<ChangeType, Change[]>;

/**
 * Groups changes by change type, keeping their relative order.
 */
export function CategorizeChanges(changes: readonly Change[]): ChangeCategories {
  const ret: ChangeCategories = { add: [], remove: [], rename: [], alter: [], sql: [] };
  for (const change of changes) {
    ret[change.ChangeType].push(change);
  }
  return ret;
}

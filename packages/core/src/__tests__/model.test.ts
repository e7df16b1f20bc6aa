import { describe, it, expect } from 'vitest';
import { Order } from '../order/order';
import {
  CategorizeChanges,
  CreateSchemaChange,
  CreateSqlChange,
  IsRemoveChange,
} from '../model/change';
import {
  ColumnChanges,
  CreateColumn,
  CreateConstraint,
  CreateFullName,
  CreateTable,
  CreateView,
  HasAnyChanges,
  NormalizeConstraintType,
  OwnChanges,
  SubSchema,
} from '../model/schema';
import { CreateSqlStatement, SqlForPlatform, UniversalSql } from '../model/sql';
import { FormatProblemLocation, IsBlockingLevel } from '../model/problem';
import { StrataError } from '../core/errors';

const order = (seq: number) => new Order([0, 0, seq]);

describe('CreateSchemaChange', () => {
  it('requires a previous name for remove and rename', () => {
    expect(() => CreateSchemaChange({ Order: order(0), ObjectType: 'table', ChangeType: 'rename' })).toThrow(
      'a rename change requires a previous name'
    );
  });

  it('refuses a previous name on add and alter', () => {
    expect(() =>
      CreateSchemaChange({ Order: order(0), ObjectType: 'table', ChangeType: 'add', PreviousName: 'OLD' })
    ).toThrow(StrataError);
  });

  it('adds the previous name to the affected names', () => {
    const change = CreateSchemaChange({
      Order: order(0),
      ObjectType: 'table',
      ChangeType: 'remove',
      PreviousName: 'OLD',
      Affects: ['ITEMS'],
    });
    expect(change.Affects).toEqual(['ITEMS', 'OLD']);
    expect(IsRemoveChange(change)).toBe(true);
  });
});

describe('CreateSqlChange', () => {
  it('requires at least one statement', () => {
    expect(() => CreateSqlChange({ Order: order(0), ObjectType: 'table', Sql: { Statements: [] } })).toThrow(
      'a sql change requires at least one statement'
    );
  });
});

describe('CategorizeChanges', () => {
  it('groups changes by type in order', () => {
    const a = CreateSchemaChange({ Order: order(0), ObjectType: 'column', ChangeType: 'alter' });
    const b = CreateSqlChange({ Order: order(1), ObjectType: 'column', Sql: UniversalSql('SELECT 1') });
    const c = CreateSchemaChange({ Order: order(2), ObjectType: 'column', ChangeType: 'alter' });
    const categories = CategorizeChanges([a, b, c]);
    expect(categories.alter).toEqual([a, c]);
    expect(categories.sql).toEqual([b]);
    expect(categories.add).toEqual([]);
  });
});

describe('schema objects', () => {
  it('joins the defined name parts', () => {
    expect(CreateFullName(undefined, 'sales', 'PRICE')).toBe('sales.PRICE');
    expect(CreateFullName('', undefined, 'PRICE')).toBe('PRICE');
  });

  it('normalizes constraint types', () => {
    expect(NormalizeConstraintType('Primary Key')).toBe('primarykey');
    expect(NormalizeConstraintType('not_null')).toBe('notnull');
  });

  it('names unnamed constraints by type and columns', () => {
    const constraint = CreateConstraint({ ConstraintType: 'Not Null', Order: order(0), ColumnNames: ['Price'] });
    expect(constraint.FullName).toBe('notnull(Price)');
    expect(constraint.Name).toBe('notnull');
  });

  it('rejects unknown constraint types', () => {
    expect(() => CreateConstraint({ ConstraintType: 'sparkly', Order: order(0) })).toThrow(
      "invalid constraint type 'sparkly'"
    );
  });

  it('defaults the data type to the value type', () => {
    const column = CreateColumn({ Name: 'Price', Order: order(0), ValueType: 'float' });
    expect(column.DataType).toBe('float');
    expect(column.AutoIncrement).toBe(false);
  });

  it('splits column changes from the table own changes', () => {
    const tableChange = CreateSchemaChange({ Order: order(1), ObjectType: 'table', ChangeType: 'alter' });
    const columnChange = CreateSqlChange({ Order: order(2), ObjectType: 'column', Sql: UniversalSql('UPDATE t') });
    const table = CreateTable({ Name: 'PRICE', Order: order(0), Changes: [tableChange, columnChange] });
    expect(OwnChanges(table)).toEqual([tableChange]);
    expect(ColumnChanges(table)).toEqual([columnChange]);
  });

  it('finds changes on nested objects', () => {
    const notNull = CreateConstraint({
      ConstraintType: 'notnull',
      Order: order(2),
      Changes: [CreateSchemaChange({ Order: order(3), ObjectType: 'constraint', ChangeType: 'add' })],
    });
    const column = CreateColumn({ Name: 'Price', Order: order(1), ValueType: 'float', Constraints: [notNull] });
    const table = CreateTable({ Name: 'PRICE', Order: order(0), Columns: [column] });
    expect(SubSchema(table)).toEqual([column]);
    expect(HasAnyChanges(table)).toBe(true);
    expect(HasAnyChanges(CreateTable({ Name: 'EMPTY', Order: order(4) }))).toBe(false);
  });

  it('replaces views by default', () => {
    const view = CreateView({ Name: 'V', Order: order(0), SelectQuery: UniversalSql('SELECT 1') });
    expect(view.ReplaceIfExists).toBe(true);
  });
});

describe('SqlForPlatform', () => {
  const set = {
    Statements: [
      CreateSqlStatement('SERIAL', 'native', ['PostgreSQL']),
      CreateSqlStatement('AUTO_INCREMENT', 'native', ['mysql']),
      CreateSqlStatement('GENERIC'),
    ],
  };

  it('takes the first preferred platform that has a statement', () => {
    expect(SqlForPlatform(set, ['oracle', 'mysql', 'postgresql'])?.Sql).toBe('AUTO_INCREMENT');
    expect(SqlForPlatform(set, 'POSTGRESQL')?.Sql).toBe('SERIAL');
  });

  it('falls back to the universal statement', () => {
    expect(SqlForPlatform(set, 'oracle')?.Sql).toBe('GENERIC');
  });

  it('returns undefined when nothing applies', () => {
    const native = { Statements: [CreateSqlStatement('X', 'native', ['mysql'])] };
    expect(SqlForPlatform(native, 'oracle')).toBeUndefined();
  });
});

describe('problems', () => {
  it('formats the location', () => {
    expect(FormatProblemLocation({ Level: 'error', Message: 'm', SourceName: 'a.yaml', SourcePosition: 'tables[0]' })).toBe(
      'a.yaml @ tables[0]'
    );
    expect(FormatProblemLocation({ Level: 'note', Message: 'm', SourceName: 'a.yaml' })).toBe('a.yaml');
  });

  it('blocks on fatal and error only', () => {
    expect(IsBlockingLevel('fatal')).toBe(true);
    expect(IsBlockingLevel('error')).toBe(true);
    expect(IsBlockingLevel('warning')).toBe(false);
    expect(IsBlockingLevel('note')).toBe(false);
  });
});

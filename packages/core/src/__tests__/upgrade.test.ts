import { describe, it, expect } from 'vitest';
import { Order } from '../order/order';
import { Change, CreateSchemaChange, CreateSqlChange, RemoveChange } from '../model/change';
import {
  Column,
  Constraint,
  CreateColumn,
  CreateConstraint,
  CreateTable,
  CreateView,
  Table,
} from '../model/schema';
import { UniversalSql } from '../model/sql';
import {
  ColumnUpgradeAnalysis,
  CreateUpgradeAnalysis,
  TableUpgradeAnalysis,
} from '../upgrade/analysis';
import { IsUpgradeAnalysis, SchemaUpgradedSet } from '../upgrade/upgraded-set';
import { DescribeEntity, FormatUpgradeProblem } from '../upgrade/problem';
import { StrataError } from '../core/errors';

let seq = 0;
function nextOrder(label?: string): Order {
  return new Order([0, 0, seq++], { Label: label });
}

function makeColumn(name: string, overrides: { Changes?: Change[]; Constraints?: Constraint[] } = {}): Column {
  return CreateColumn({ Name: name, Order: nextOrder(name), ValueType: 'int', ...overrides });
}

function makeTable(name: string, overrides: { Columns?: Column[]; Changes?: Change[]; Constraints?: Constraint[] } = {}): Table {
  return CreateTable({ Name: name, Order: nextOrder(name), ...overrides });
}

function change(changeType: 'add' | 'alter', objectType: 'table' | 'column' = 'table'): Change {
  return CreateSchemaChange({ Order: nextOrder(), ObjectType: objectType, ChangeType: changeType });
}

function rename(previousName: string, objectType: 'table' | 'column' = 'table'): Change {
  return CreateSchemaChange({ Order: nextOrder(), ObjectType: objectType, ChangeType: 'rename', PreviousName: previousName });
}

function remove(previousName: string): RemoveChange {
  const created = CreateSchemaChange({ Order: nextOrder(), ObjectType: 'table', ChangeType: 'remove', PreviousName: previousName });
  if (created.ChangeType !== 'remove') {
    throw new Error('expected a remove change');
  }
  return { ...created, ChangeType: 'remove' };
}

function messages(problems: readonly { Message: string }[]): string[] {
  return problems.map((p) => p.Message);
}

describe('SchemaUpgradedSet', () => {
  it('finds no changes between identical tables', () => {
    const before = makeTable('PRICE', { Columns: [makeColumn('Price')] });
    const after = makeTable('PRICE', { Columns: [makeColumn('Price')] });
    const set = new SchemaUpgradedSet([before], [after]);

    expect(set.Upgrades).toHaveLength(1);
    expect(set.HasChanges()).toBe(false);
    expect(set.Errors).toEqual([]);
    expect(set.Warnings).toEqual([]);
  });

  it('matches a renamed table by its previous name', () => {
    const before = makeTable('OLD');
    const after = makeTable('NEW', { Changes: [rename('OLD')] });
    const set = new SchemaUpgradedSet([before], [after]);

    expect(set.Upgrades).toHaveLength(1);
    const upgrade = set.Upgrades[0];
    expect(upgrade.Before).toBe(before);
    expect(upgrade.Name).toBe('NEW');
    expect(upgrade.ChangeCategories.rename).toHaveLength(1);
    expect(upgrade.HasChanges()).toBe(true);
    expect(set.Errors).toEqual([]);
    expect(set.Warnings).toEqual([]);
  });

  it('reports a remove change that matches nothing', () => {
    const gone = remove('GONE');
    const set = new SchemaUpgradedSet([], [gone]);

    expect(set.Upgrades).toEqual([]);
    expect(set.Errors).toEqual([{ Subject: gone, Message: 'remove change has no known previous object' }]);
  });

  it('removes an object named by a remove change', () => {
    const before = makeTable('OLD');
    const gone = remove('OLD');
    const set = new SchemaUpgradedSet([before], [gone]);

    expect(set.Upgrades).toHaveLength(1);
    const upgrade = set.Upgrades[0];
    expect(upgrade).toBeInstanceOf(TableUpgradeAnalysis);
    expect(upgrade.IsRemoval).toBe(true);
    expect(upgrade.Name).toBe('OLD');
    expect(upgrade.ChangeCategories.remove).toEqual([gone]);
    expect(set.Warnings).toEqual([]);
    expect(set.Errors).toEqual([]);
  });

  it('warns about an object that disappears without a remove change', () => {
    const before = makeTable('old');
    const set = new SchemaUpgradedSet([before], []);

    expect(messages(set.Warnings)).toEqual(['no explicit removal for old', 'implicit removal of object']);
    expect(set.Upgrades[0].IsRemoval).toBe(true);
    expect(set.Upgrades[0].Name).toBe('old');
    expect(set.HasChanges()).toBe(true);
  });

  it('warns about an added object without an add change', () => {
    const set = new SchemaUpgradedSet([], [makeTable('NEW')]);
    expect(messages(set.Warnings)).toEqual(['implicit add']);
    expect(set.Upgrades[0].IsAddition).toBe(true);
  });

  it('accepts an added object with an add change', () => {
    const set = new SchemaUpgradedSet([], [makeTable('NEW', { Changes: [change('add')] })]);
    expect(set.Warnings).toEqual([]);
    expect(set.Errors).toEqual([]);
  });

  it('refuses an alter on an object with no previous version', () => {
    const set = new SchemaUpgradedSet([], [makeTable('NEW', { Changes: [change('alter')] })]);
    expect(messages(set.Errors)).toEqual(['can only add due to no previous version found']);
    expect(messages(set.Warnings)).toEqual(['implicit add']);
  });

  it('reports duplicate names on both sides', () => {
    const set = new SchemaUpgradedSet(
      [makeTable('T'), makeTable('T')],
      [makeTable('T'), makeTable('T')]
    );
    expect(messages(set.Errors)).toEqual(['duplicate name', 'duplicate name']);
    expect(set.Upgrades).toHaveLength(2);
    expect(set.Upgrades[0].IsAddition).toBe(false);
    expect(set.Upgrades[1].IsAddition).toBe(true);
  });

  it('keeps changes that do not target an object as stand-alone', () => {
    const sql = CreateSqlChange({ Order: nextOrder(), ObjectType: 'table', Sql: UniversalSql('UPDATE ITEMS SET X = 1') });
    const set = new SchemaUpgradedSet([], [sql]);
    expect(set.StandAloneChanges).toEqual([sql]);
    expect(set.HasChanges()).toBe(true);
  });

  it('sorts stand-alone changes and upgrades by order', () => {
    const early = makeTable('EARLY');
    const late = makeTable('LATE');
    const sql = CreateSqlChange({
      Order: new Order([0, -1, 0], { After: ['late'] }),
      ObjectType: 'table',
      Sql: UniversalSql('UPDATE LATE SET X = 1'),
    });
    const set = new SchemaUpgradedSet([], [sql, early, late]);

    // the change pulls LATE ahead of EARLY
    const steps = set.AllUpgrades.map((step) => (IsUpgradeAnalysis(step) ? step.Name : 'sql'));
    expect(steps).toEqual(['LATE', 'sql', 'EARLY']);
    expect(set.AllUpgrades).toBe(set.AllUpgrades);
  });

  it('finds an upgrade by name', () => {
    const set = new SchemaUpgradedSet([makeTable('A')], [makeTable('A'), makeTable('B')]);
    expect(set.Find('B')?.IsAddition).toBe(true);
    expect(set.Find('C')).toBeUndefined();
  });
});

describe('UpgradeAnalysis', () => {
  it('needs at least one side', () => {
    expect(() => CreateUpgradeAnalysis(undefined, undefined)).toThrow(StrataError);
  });

  it('reports an upgrade between kinds', () => {
    const view = CreateView({ Name: 'V', Order: nextOrder(), SelectQuery: UniversalSql('SELECT 1') });
    const analysis = CreateUpgradeAnalysis(view, makeTable('V'));
    expect(analysis).toBeInstanceOf(TableUpgradeAnalysis);
    expect(messages(analysis.Errors)).toEqual(['cannot upgrade directly from a view to a table']);
  });

  it('allows one big change only', () => {
    const analysis = CreateUpgradeAnalysis(makeTable('A'), makeTable('B', { Changes: [rename('A'), rename('X')] }));
    expect(messages(analysis.Errors)).toEqual([
      'at most 1 rename is allowed',
      'at most 1 of an add, remove, or rename is allowed, and it cannot be done with an alter or sql change',
    ]);
  });

  it('refuses a rename combined with an alter', () => {
    const analysis = CreateUpgradeAnalysis(makeTable('A'), makeTable('B', { Changes: [rename('A'), change('alter')] }));
    expect(messages(analysis.Errors)).toEqual([
      'at most 1 of an add, remove, or rename is allowed, and it cannot be done with an alter or sql change',
    ]);
  });

  it('diffs the columns of a table', () => {
    const before = makeTable('PRICE', { Columns: [makeColumn('Price')] });
    const after = makeTable('PRICE', {
      Columns: [makeColumn('Price', { Changes: [change('alter', 'column')] }), makeColumn('Cost', { Changes: [change('add', 'column')] })],
    });
    const analysis = CreateUpgradeAnalysis(before, after);
    if (!(analysis instanceof TableUpgradeAnalysis)) {
      throw new Error('expected a table analysis');
    }

    expect(analysis.ColumnChanges?.Upgrades.map((u) => u.Name)).toEqual(['Price', 'Cost']);
    expect(analysis.ColumnChanges?.Upgrades[0]).toBeInstanceOf(ColumnUpgradeAnalysis);
    expect(analysis.HasChanges()).toBe(true);
    expect(analysis.Errors).toEqual([]);
    expect(analysis.Warnings).toEqual([]);
  });

  it('copies column problems into the table analysis', () => {
    const before = makeTable('PRICE', { Columns: [makeColumn('Price'), makeColumn('Gone')] });
    const after = makeTable('PRICE', { Columns: [makeColumn('Price')] });
    const analysis = CreateUpgradeAnalysis(before, after);
    expect(messages(analysis.Warnings)).toEqual(['no explicit removal for Gone', 'implicit removal of object']);
  });

  it('rejects a column change that is not raw sql and has no column', () => {
    const stray = change('alter', 'column');
    const before = makeTable('PRICE');
    const after = makeTable('PRICE', { Changes: [stray] });
    const analysis = CreateUpgradeAnalysis(before, after);
    expect(analysis.Errors).toEqual([{ Subject: stray, Message: 'invalid columnar change' }]);
    expect(analysis.ChangeCategories.alter).toEqual([]);
  });

  it('accepts a raw sql column change without a column', () => {
    const sql = CreateSqlChange({ Order: nextOrder(), ObjectType: 'column', Sql: UniversalSql('UPDATE PRICE SET Price = 0') });
    const analysis = CreateUpgradeAnalysis(makeTable('PRICE'), makeTable('PRICE', { Changes: [sql] }));
    expect(analysis.Errors).toEqual([]);
    expect(analysis.HasChanges()).toBe(true);
  });

  it('copies constraint warnings into the owning analysis', () => {
    const notNull = CreateConstraint({ ConstraintType: 'not null', Order: nextOrder(), ColumnNames: ['Price'] });
    const analysis = CreateUpgradeAnalysis(makeColumn('Price', { Constraints: [notNull] }), makeColumn('Price'));

    expect(messages(analysis.ConstraintChanges.Warnings)).toEqual([
      'no explicit removal for notnull(Price)',
      'implicit removal of object',
    ]);
    expect(messages(analysis.Warnings)).toEqual([
      'no explicit removal for notnull(Price)',
      'implicit removal of object',
    ]);
    expect(analysis.HasChanges()).toBe(true);
  });

  it('carries constraint errors up to the table set', () => {
    const altered = CreateConstraint({
      ConstraintType: 'not null',
      Order: nextOrder(),
      ColumnNames: ['Price'],
      Changes: [CreateSchemaChange({ Order: nextOrder(), ObjectType: 'constraint', ChangeType: 'alter' })],
    });
    const index = CreateConstraint({ ConstraintType: 'index', Order: nextOrder(), ColumnNames: ['Price'] });
    const again = CreateConstraint({ ConstraintType: 'index', Order: nextOrder(), ColumnNames: ['Price'] });
    const set = new SchemaUpgradedSet(
      [makeTable('T')],
      [makeTable('T', { Constraints: [altered, index, again] })]
    );

    expect(messages(set.Errors)).toEqual(['duplicate name', 'can only add due to no previous version found']);
  });
});

describe('problem rendering', () => {
  it('describes objects and changes', () => {
    const table = CreateTable({ Name: 'PRICE', SchemaName: 'sales', Order: new Order([0, 0, 0]) });
    const renamed = CreateSchemaChange({
      Order: new Order([0, 2, 1]),
      ObjectType: 'column',
      ChangeType: 'rename',
      PreviousName: 'Old',
    });
    expect(DescribeEntity(table)).toBe('table sales.PRICE');
    expect(DescribeEntity(renamed)).toBe('rename column change of Old (0, 2, 1)');
    expect(FormatUpgradeProblem({ Subject: table, Message: 'implicit add' })).toBe('implicit add: table sales.PRICE');
  });
});

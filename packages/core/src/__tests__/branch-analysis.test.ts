import { describe, it, expect } from 'vitest';
import { Order } from '../order/order';
import { CreateSchemaChange, CreateSqlChange } from '../model/change';
import { CreateColumn, CreateConstraint, CreateTable, Table } from '../model/schema';
import { SchemaProblem } from '../model/problem';
import { UniversalSql } from '../model/sql';
import { CreateSchemaVersion } from '../version/branch';
import { SchemaPackage } from '../version/package';
import { SchemaVersionNumber } from '../version/version-number';
import { BranchUpgradeAnalysis, CreationOrder, FormatBranchProblem } from '../upgrade/branch-analysis';
import { IsUpgradeAnalysis } from '../upgrade/upgraded-set';

function makeTable(name: string, seq: number, withAdd: boolean = false): Table {
  return CreateTable({
    Name: name,
    Order: new Order([0, 0, seq]),
    Columns: [CreateColumn({ Name: 'Id', Order: new Order([0, 1, seq]), ValueType: 'int' })],
    Changes: withAdd
      ? [CreateSchemaChange({ Order: new Order([0, 2, seq]), ObjectType: 'table', ChangeType: 'add' })]
      : [],
  });
}

function makePackage(currentProblems: SchemaProblem[] = []): SchemaPackage {
  const pkg = new SchemaPackage('orders');
  pkg.AddBranchVersion(
    CreateSchemaVersion(
      'orders',
      new SchemaVersionNumber(1),
      [],
      [makeTable('ITEMS', 0), makeTable('OLD', 9)],
      [{ Level: 'warning', Message: 'old note', SourceName: 'v1.yaml' }]
    )
  );
  pkg.AddBranchVersion(
    CreateSchemaVersion(
      'orders',
      new SchemaVersionNumber(2),
      [CreateSqlChange({ Order: new Order([0, 0, 5]), ObjectType: 'table', Sql: UniversalSql('UPDATE ITEMS SET Id = Id') })],
      [makeTable('PRICE', 1, true), makeTable('ITEMS', 0)],
      currentProblems
    ),
    new SchemaVersionNumber(1)
  );
  return pkg;
}

function branchOf(pkg: SchemaPackage, version: number) {
  const branch = pkg.Get(new SchemaVersionNumber(version));
  if (!branch) {
    throw new Error(`missing test branch ${version}`);
  }
  return branch;
}

describe('BranchUpgradeAnalysis', () => {
  it('treats a root branch as a base version', () => {
    const analysis = new BranchUpgradeAnalysis(branchOf(makePackage(), 1));

    expect(analysis.IsUpgrade).toBe(false);
    expect(analysis.UpgradeSet).toBeNull();
    expect(analysis.Changes).toEqual([]);
    expect(CreationOrder(analysis.CurrentVersion).map((o) => o.FullName)).toEqual(['ITEMS', 'OLD']);
    expect(analysis.Problems.map((p) => [p.Origin, p.Message])).toEqual([['current', 'old note']]);
  });

  it('orders the upgrade steps of a child branch', () => {
    const analysis = new BranchUpgradeAnalysis(branchOf(makePackage(), 2));

    expect(analysis.IsUpgrade).toBe(true);
    expect(analysis.PreviousVersion?.Version.toString()).toBe('1');
    const steps = analysis.Changes.map((step) => (IsUpgradeAnalysis(step) ? step.Name : step.ChangeType));
    expect(steps).toEqual(['ITEMS', 'PRICE', 'sql', 'OLD']);
  });

  it('collects current, parent and upgrade problems in that order', () => {
    const analysis = new BranchUpgradeAnalysis(
      branchOf(makePackage([{ Level: 'error', Message: 'bad item', SourceName: 'v2.yaml', SourcePosition: 'tables[3]' }]), 2)
    );

    expect(analysis.Problems.map((p) => [p.Origin, p.Level, p.Version.toString(), p.Message, p.Location])).toEqual([
      ['current', 'error', '2', 'bad item', 'v2.yaml @ tables[3]'],
      ['parent', 'warning', '1', 'old note', 'v1.yaml'],
      ['upgrade', 'warning', '2', 'no explicit removal for OLD', 'table OLD'],
      ['upgrade', 'warning', '2', 'implicit removal of object', 'table OLD'],
    ]);
    expect(FormatBranchProblem(analysis.Problems[0])).toBe('(2) bad item [v2.yaml @ tables[3]]');
  });

  it('blocks on errors, and on warnings when asked', () => {
    const clean = new BranchUpgradeAnalysis(branchOf(makePackage(), 2));
    expect(clean.HasBlockingProblems()).toBe(false);
    expect(clean.HasBlockingProblems(true)).toBe(true);

    const broken = new BranchUpgradeAnalysis(
      branchOf(makePackage([{ Level: 'fatal', Message: 'unreadable', SourceName: 'v2.yaml' }]), 2)
    );
    expect(broken.HasBlockingProblems()).toBe(true);
  });

  it('blocks on errors found among a table\'s constraints', () => {
    const index = (seq: number) =>
      CreateConstraint({ ConstraintType: 'index', Order: new Order([0, 3, seq]), ColumnNames: ['Id'] });
    const pkg = new SchemaPackage('orders');
    pkg.AddBranchVersion(CreateSchemaVersion('orders', new SchemaVersionNumber(1), [], [makeTable('ITEMS', 0)], []));
    pkg.AddBranchVersion(
      CreateSchemaVersion(
        'orders',
        new SchemaVersionNumber(2),
        [],
        [{ ...makeTable('ITEMS', 0), Constraints: [index(0), index(1)] }],
        []
      ),
      new SchemaVersionNumber(1)
    );

    const analysis = new BranchUpgradeAnalysis(branchOf(pkg, 2));

    expect(analysis.Problems.filter((p) => p.Level === 'error').map((p) => [p.Message, p.Location])).toEqual([
      ['duplicate name', 'constraint index(Id)'],
    ]);
    expect(analysis.HasBlockingProblems()).toBe(true);
  });
});

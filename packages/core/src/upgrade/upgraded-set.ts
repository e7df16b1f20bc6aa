/**
 * @module upgrade/upgraded-set
 * Matches a list of objects from the previous version against the objects
 * and changes of the current version.
 *
 * Objects are matched by full name, or by the previous name of their rename
 * change. Remove changes claim the object they name. Anything left over in
 * the previous version is removed implicitly; anything new is added. Other
 * changes are not matched to any object and are kept as stand-alone changes.
 */

import { Change, IsChange, IsRemoveChange } from '../model/change';
import { OwnChanges, SchemaEntity, SchemaObject } from '../model/schema';
import { SortByOrder } from '../order/order';
import { CreateUpgradeAnalysis, UpgradeAnalysis } from './analysis';
import { CreateUpgradeProblem, UpgradeAnalysisProblem } from './problem';

/**
 * One unit of an upgrade: an object analysis or a stand-alone change.
 */
export type UpgradeStep = UpgradeAnalysis | Change;

export function IsUpgradeAnalysis(step: UpgradeStep): step is UpgradeAnalysis {
  return step instanceof UpgradeAnalysis;
}

/**
 * The matched upgrades for one list of objects.
 */
export class SchemaUpgradedSet {
  /** One analysis per matched, added or removed object, in match order */
  readonly Upgrades: readonly UpgradeAnalysis[];

  /** Changes that do not target a single object */
  readonly StandAloneChanges: readonly Change[];

  private readonly errors: UpgradeAnalysisProblem[] = [];
  private readonly warnings: UpgradeAnalysisProblem[] = [];
  private sorted: UpgradeStep[] | null = null;

  /**
   * @param beforeList - Objects of the previous version
   * @param afterList - Objects and changes of the current version
   */
  constructor(beforeList: readonly SchemaObject[], afterList: readonly SchemaEntity[]) {
    const upgrades: UpgradeAnalysis[] = [];
    const standAlone: Change[] = [];

    const beforeNames = new Map<string, SchemaObject>();
    for (const obj of beforeList) {
      if (beforeNames.has(obj.FullName)) {
        this.errors.push(CreateUpgradeProblem(obj, 'duplicate name'));
      } else {
        beforeNames.set(obj.FullName, obj);
      }
    }

    const afterNames = new Set<string>();
    for (const entity of afterList) {
      if (IsChange(entity)) {
        if (IsRemoveChange(entity)) {
          const match = beforeNames.get(entity.PreviousName);
          if (match) {
            upgrades.push(CreateUpgradeAnalysis(match, entity));
            beforeNames.delete(entity.PreviousName);
          } else {
            this.errors.push(
              CreateUpgradeProblem(entity, 'remove change has no known previous object')
            );
          }
        } else {
          standAlone.push(entity);
        }
        continue;
      }

      if (afterNames.has(entity.FullName)) {
        this.errors.push(CreateUpgradeProblem(entity, 'duplicate name'));
      }
      afterNames.add(entity.FullName);

      const name = previousNameOf(entity) ?? entity.FullName;
      const match = beforeNames.get(name);
      if (match) {
        upgrades.push(CreateUpgradeAnalysis(match, entity));
        beforeNames.delete(name);
      } else {
        upgrades.push(CreateUpgradeAnalysis(undefined, entity));
      }
    }

    for (const [name, leftover] of beforeNames) {
      this.warnings.push(CreateUpgradeProblem(leftover, `no explicit removal for ${name}`));
      upgrades.push(CreateUpgradeAnalysis(leftover, undefined));
    }

    for (const upgrade of upgrades) {
      this.errors.push(...upgrade.Errors);
      this.warnings.push(...upgrade.Warnings);
    }

    this.Upgrades = upgrades;
    this.StandAloneChanges = standAlone;
  }

  get Errors(): readonly UpgradeAnalysisProblem[] {
    return this.errors;
  }

  get Warnings(): readonly UpgradeAnalysisProblem[] {
    return this.warnings;
  }

  /**
   * Stand-alone changes and object upgrades together, sorted by Order
   * (including before/after constraints).
   *
   * @throws CyclicOrderError if the constraints form a loop
   */
  get AllUpgrades(): readonly UpgradeStep[] {
    if (this.sorted === null) {
      this.sorted = SortByOrder<UpgradeStep>([...this.StandAloneChanges, ...this.Upgrades]);
    }
    return this.sorted;
  }

  /**
   * True when there is a stand-alone change or any upgrade has changes.
   */
  HasChanges(): boolean {
    return this.StandAloneChanges.length > 0 || this.Upgrades.some((u) => u.HasChanges());
  }

  /**
   * The analysis for an object, by its current (or removed) full name.
   */
  Find(name: string): UpgradeAnalysis | undefined {
    return this.Upgrades.find((u) => u.Name === name);
  }
}

/**
 * The previous name given by the object's first rename change, if any.
 * Extra rename changes are reported by the analysis itself.
 */
function previousNameOf(obj: SchemaObject): string | undefined {
  for (const change of OwnChanges(obj)) {
    if (change.Type === 'schema-change' && change.ChangeType === 'rename') {
      return change.PreviousName;
    }
  }
  return undefined;
}

/**
 * @module upgrade/problem
 * Problems found while analyzing an upgrade.
 */

import { IsChange } from '../model/change';
import { SchemaEntity } from '../model/schema';

/**
 * A problem in an upgrade definition, attached to the object or change it
 * was found on. Informational: the analysis keeps going after recording one.
 */
export interface UpgradeAnalysisProblem {
  Subject: SchemaEntity;
  Message: string;
}

export function CreateUpgradeProblem(subject: SchemaEntity, message: string): UpgradeAnalysisProblem {
  return { Subject: subject, Message: message };
}

/**
 * Short human-readable description of an object or change, e.g.
 * `table sales.PRICE` or `rename column change (0, 2, 1)`.
 */
export function DescribeEntity(entity: SchemaEntity): string {
  if (IsChange(entity)) {
    const target = entity.Type === 'schema-change' && entity.PreviousName !== undefined
      ? ` of ${entity.PreviousName}`
      : '';
    return `${entity.ChangeType} ${entity.ObjectType} change${target} ${entity.Order}`;
  }
  return `${entity.Type} ${entity.FullName}`;
}

/**
 * Renders a problem as `message: subject`.
 */
export function FormatUpgradeProblem(problem: UpgradeAnalysisProblem): string {
  return `${problem.Message}: ${DescribeEntity(problem.Subject)}`;
}

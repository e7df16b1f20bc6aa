/**
 * @module commands/base
 * Implementation of the `strata base` CLI command.
 */

import { Strata, StrataConfig } from '@strata/core';
import { PrintPlan, PrintProblems, LogInfo, LogSuccess, LogError } from '../formatting';

/**
 * Executes the base command: lists a version's objects in creation order.
 *
 * @param config - Resolved Strata configuration
 * @param source - Package source, optionally with `@version`
 */
export async function RunBase(config: StrataConfig, source?: string): Promise<boolean> {
  const strata = new Strata(config);
  strata.OnProgress({ OnLog: LogInfo });

  const result = await strata.Base(source);
  if (result.ErrorMessage) {
    LogError(result.ErrorMessage);
    return false;
  }

  console.log();
  LogInfo(`Create ${result.Package} at ${result.Version}`);
  console.log();
  PrintPlan(result.Steps);
  PrintProblems(result.Problems);

  if (result.Success) {
    LogSuccess(`${result.Steps.length} object(s)`);
  }
  console.log();
  return result.Success;
}

/**
 * @module commands/plan
 * Implementation of the `strata plan` CLI command.
 */

import { Strata, StrataConfig } from '@strata/core';
import { PrintPlan, PrintPackageProblems, PrintProblems, LogInfo, LogSuccess, LogError } from '../formatting';

/**
 * Executes the plan command: prints the upgrade (or create) steps for a
 * version and the problems that block it.
 *
 * @param config - Resolved Strata configuration
 * @param source - Package source, optionally with `@version`
 * @param quiet - When true, suppress loader progress output
 */
export async function RunPlan(config: StrataConfig, source?: string, quiet: boolean = false): Promise<boolean> {
  const strata = new Strata(config);
  if (!quiet) {
    strata.OnProgress({ OnLog: LogInfo });
  }

  LogInfo(`Platforms: ${(config.Platforms ?? ['all']).join(', ')}`);
  console.log();

  const result = await strata.Plan(source);
  if (result.ErrorMessage) {
    LogError(result.ErrorMessage);
    return false;
  }

  const header = result.IsUpgrade
    ? `Upgrade ${result.Package} from ${result.ParentVersion} to ${result.Version}`
    : `Create ${result.Package} at ${result.Version}`;
  LogInfo(header);
  console.log();
  PrintPlan(result.Steps);

  PrintPackageProblems(result.PackageProblems);
  PrintProblems(result.Problems);

  if (result.Success) {
    LogSuccess(`${result.Steps.length} step(s) planned`);
  } else {
    LogError('Plan has blocking problems');
  }
  console.log();
  return result.Success;
}

/**
 * @module commands/validate
 * Implementation of the `strata validate` CLI command.
 */

import { Strata, StrataConfig } from '@strata/core';
import { LogInfo, LogSuccess, LogWarning, LogError } from '../formatting';

/**
 * Executes the validate command: analyzes every version of a package.
 *
 * @param config - Resolved Strata configuration
 * @param source - Package source; defaults to the first configured one
 */
export async function RunValidate(config: StrataConfig, source?: string): Promise<boolean> {
  const strata = new Strata(config);
  strata.OnProgress({ OnLog: LogInfo });

  try {
    const result = await strata.Validate(source);
    console.log();

    for (const warning of result.Warnings) {
      LogWarning(warning);
    }

    if (result.Valid) {
      LogSuccess('All versions validated successfully');
    } else {
      LogError('Validation failed:');
      for (const error of result.Errors) {
        console.log(`    - ${error}`);
      }
    }

    console.log();
    return result.Valid;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }
}

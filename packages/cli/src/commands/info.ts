/**
 * @module commands/info
 * Implementation of the `strata info` CLI command.
 */

import { Strata, StrataConfig } from '@strata/core';
import { PrintInfoTable, LogInfo, LogError } from '../formatting';

/**
 * Executes the info command: displays the version tree of a package.
 *
 * @param config - Resolved Strata configuration
 * @param source - Package source; defaults to the first configured one
 */
export async function RunInfo(config: StrataConfig, source?: string): Promise<boolean> {
  const strata = new Strata(config);

  try {
    LogInfo(`Package: ${source ?? config.Sources[0]}`);
    console.log();

    const info = await strata.Info(source);
    PrintInfoTable(info);

    const newest = info.Versions.find((v) => v.Newest);
    if (newest) {
      LogInfo(`Newest version: ${newest.Version}`);
    }

    console.log();
    return info.UnresolvedParents.length === 0;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }
}

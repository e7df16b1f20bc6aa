/**
 * @module @strata/cli
 *
 * CLI package for Strata.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig } from './config-loader';
export type { CLIOptions } from './config-loader';
export { RunPlan } from './commands/plan';
export { RunBase } from './commands/base';
export { RunInfo } from './commands/info';
export { RunValidate } from './commands/validate';

/**
 * @module formatting
 * Console output formatting for the Strata CLI.
 * Provides colored, structured output for plans, version trees and problems.
 */

import chalk from 'chalk';
import {
  BranchProblem,
  FormatBranchProblem,
  InfoResult,
  PlanAction,
  PlanStep,
  ProblemLevel,
  SchemaProblem,
} from '@strata/core';

/**
 * Prints the Strata banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  Strata') + chalk.gray(' · versioned schema upgrade planning'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Prints the steps of a plan, one per line.
 */
export function PrintPlan(steps: PlanStep[]): void {
  if (steps.length === 0) {
    console.log(chalk.yellow('  No changes.'));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Action', 10) +
      padRight('Type', 12) +
      padRight('Name', 40) +
      padRight('Order', 20)
  );
  console.log(chalk.gray('  ' + '─'.repeat(82)));

  for (const step of steps) {
    const color = getActionColor(step.Action);
    console.log(
      '  ' +
        color(padRight(step.Action, 10)) +
        padRight(step.ObjectType, 12) +
        padRight(truncate(step.Name, 38), 40) +
        chalk.gray(step.Order)
    );
    if (step.Sql !== undefined) {
      console.log(chalk.gray('      ' + truncate(step.Sql.replace(/\s+/g, ' '), 76)));
    }
  }
  console.log();
}

/**
 * Formats the version tree for the `info` command.
 */
export function PrintInfoTable(info: InfoResult): void {
  if (info.Versions.length === 0) {
    console.log(chalk.yellow(`  No versions found for ${info.Package}.`));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Version', 14) +
      padRight('Parent', 14) +
      padRight('Children', 30)
  );
  console.log(chalk.gray('  ' + '─'.repeat(58)));

  for (const version of info.Versions) {
    const label = version.Newest ? chalk.green(padRight(version.Version, 14)) : padRight(version.Version, 14);
    console.log(
      '  ' +
        label +
        padRight(version.Parent ?? '(root)', 14) +
        chalk.gray(truncate(version.Children.join(', '), 30))
    );
  }

  for (const pending of info.PendingVersions) {
    console.log('  ' + chalk.yellow(padRight(pending, 14)) + chalk.gray('waiting for a missing parent'));
  }
  if (info.UnresolvedParents.length > 0) {
    console.log(chalk.red(`\n  Missing parent version(s): ${info.UnresolvedParents.join(', ')}`));
  }
  console.log();
}

/**
 * Prints branch problems, errors in red and warnings in yellow.
 */
export function PrintProblems(problems: BranchProblem[]): void {
  for (const problem of problems) {
    const color = problem.Level === 'warning' ? chalk.yellow : chalk.red;
    console.log(color(`  ${problem.Level.toUpperCase()}: `) + FormatBranchProblem(problem));
  }
}

/**
 * Prints problems found while loading a package, each at its own level.
 */
export function PrintPackageProblems(problems: readonly SchemaProblem[]): void {
  for (const problem of problems) {
    LoggerForLevel(problem.Level)(`${problem.Message} [${problem.SourceName}]`);
  }
}

/**
 * Picks the log function for a problem level.
 */
export function LoggerForLevel(level: ProblemLevel): (message: string) => void {
  switch (level) {
    case 'warning':
      return LogWarning;
    case 'note':
      return LogInfo;
    default:
      return LogError;
  }
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs a warning.
 */
export function LogWarning(message: string): void {
  console.log(chalk.yellow('  WARNING: ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Returns a chalk color function for a plan action.
 */
function getActionColor(action: PlanAction): chalk.Chalk {
  switch (action) {
    case 'create':
    case 'add':
      return chalk.green;
    case 'remove':
      return chalk.red;
    case 'rename':
      return chalk.magenta;
    case 'sql':
      return chalk.cyan;
    default:
      return chalk.white;
  }
}

/**
 * Right-pads a string to a given width.
 */
function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

/**
 * Truncates a string to a maximum length, appending '...' if needed.
 */
function truncate(str: string, maxLen: number): string {
  return str.length <= maxLen ? str : str.substring(0, maxLen - 3) + '...';
}

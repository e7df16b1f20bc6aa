#!/usr/bin/env node
/**
 * @module bin/strata
 * CLI entry point for Strata.
 *
 * Usage:
 *   strata plan [source] [options]
 *   strata base [source] [options]
 *   strata info [source] [options]
 *   strata validate [source] [options]
 */

import { Command } from 'commander';
import { LoadConfig, CLIOptions } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunPlan } from '../commands/plan';
import { RunBase } from '../commands/base';
import { RunInfo } from '../commands/info';
import { RunValidate } from '../commands/validate';
import { StrataConfig } from '@strata/core';

const program = new Command();

program
  .name('strata')
  .description('Strata · upgrade planning for versioned, declarative schemas')
  .version('0.1.0');

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .argument('[source]', 'Package directory, optionally with @version (e.g. ./schema/orders@2)')
    .option('--sources <paths>', 'Package directories (comma-separated)')
    .option('--platform <names>', 'Target platforms in preference order (comma-separated)')
    .option('--file-patterns <globs>', 'Schema document patterns (comma-separated)')
    .option('--manifest-file <name>', 'Version manifest file name')
    .option('--warnings-as-errors', 'Treat warnings as blocking problems')
    .option('--config <path>', 'Path to config file')
    .option('-q, --quiet', 'Suppress progress output');
}

// ─── Commands ───────────────────────────────────────────────────────

addSharedOptions(
  program
    .command('plan')
    .description('Plan the upgrade to a version (the newest by default)')
).action(async (source: string | undefined, opts: Record<string, unknown>) => {
  PrintBanner();
  const config = loadOrExit(source, opts);
  const success = await RunPlan(config, source, opts.quiet === true);
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('base')
    .description('List the objects of a version in creation order')
).action(async (source: string | undefined, opts: Record<string, unknown>) => {
  PrintBanner();
  const config = loadOrExit(source, opts);
  const success = await RunBase(config, source);
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('info')
    .description('Show the version tree of a package')
).action(async (source: string | undefined, opts: Record<string, unknown>) => {
  PrintBanner();
  const config = loadOrExit(source, opts);
  const success = await RunInfo(config, source);
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('validate')
    .description('Analyze every version of a package and report problems')
).action(async (source: string | undefined, opts: Record<string, unknown>) => {
  PrintBanner();
  const config = loadOrExit(source, opts);
  const success = await RunValidate(config, source);
  process.exit(success ? 0 : 1);
});

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Loads configuration; a positional source counts as a configured one.
 */
function loadOrExit(source: string | undefined, opts: Record<string, unknown>): StrataConfig {
  const cli = mapOptions(opts);
  if (source !== undefined && cli.Sources === undefined) {
    cli.Sources = source;
  }
  try {
    return LoadConfig(cli);
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: Record<string, unknown>): CLIOptions {
  return {
    Sources: stringOption(opts.sources),
    Platform: stringOption(opts.platform),
    FilePatterns: stringOption(opts.filePatterns),
    ManifestFile: stringOption(opts.manifestFile),
    WarningsAsErrors: opts.warningsAsErrors === true ? true : undefined,
    Config: stringOption(opts.config),
  };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// Run
program.parse();

/**
 * @module config-loader
 * Loads Strata configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables
 * 3. Config file (strata.json or strata.config.js)
 * 4. .env file (via dotenv)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { StrataConfig, StrataError } from '@strata/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = [
  'strata.json',
  'strata.config.json',
  'strata.config.js',
  'strata.config.cjs',
];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Package directories (comma-separated) */
  Sources?: string;

  /** Schema document glob patterns (comma-separated) */
  FilePatterns?: string;

  /** Manifest file name */
  ManifestFile?: string;

  /** Target platforms, in preference order (comma-separated) */
  Platform?: string;

  /** Treat warnings as blocking problems */
  WarningsAsErrors?: boolean;

  /** Path to config file */
  Config?: string;
}

/** A list of strings, or one comma-separated string */
const ListSchema = z.union([z.string(), z.array(z.string())]).transform(splitList);

/**
 * Shape of a config file, after key normalization.
 */
const FileConfigSchema = z
  .object({
    Sources: ListSchema.optional(),
    FilePatterns: ListSchema.optional(),
    ManifestFile: z.string().min(1).optional(),
    TreatWarningsAsErrors: z.boolean().optional(),
    Platforms: ListSchema.optional(),
  })
  .strict();

type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file discovery; relative
 *   sources in a config file are resolved against the file's directory
 * @returns Merged StrataConfig
 * @throws StrataError (`INVALID_CONFIG`) if the config file is invalid or no source is set
 */
export function LoadConfig(cliOptions: CLIOptions, cwd: string = process.cwd()): StrataConfig {
  // Load .env file if present; a missing file leaves the environment alone
  dotenv.config({ path: path.join(cwd, '.env') });

  const loaded = loadConfigFile(cliOptions.Config, cwd);
  const fileConfig = loaded?.Config;
  const fileSources = fileConfig?.Sources?.map((s) => path.resolve(loaded?.Directory ?? cwd, s));

  // Merge: CLI > env > file > defaults
  const sources = listOption(cliOptions.Sources)
    ?? listOption(process.env.STRATA_SOURCES)
    ?? fileSources;

  if (!sources || sources.length === 0) {
    throw new StrataError(
      'INVALID_CONFIG',
      'At least one package source is required. Set via --sources, STRATA_SOURCES env var, or config file.'
    );
  }

  const platforms = listOption(cliOptions.Platform)
    ?? listOption(process.env.STRATA_PLATFORM)
    ?? fileConfig?.Platforms
    ?? ['all'];

  const warningsAsErrors = cliOptions.WarningsAsErrors
    ?? booleanOption(process.env.STRATA_WARNINGS_AS_ERRORS)
    ?? fileConfig?.TreatWarningsAsErrors
    ?? false;

  return {
    Sources: sources,
    FilePatterns: listOption(cliOptions.FilePatterns) ?? fileConfig?.FilePatterns,
    ManifestFile: cliOptions.ManifestFile ?? fileConfig?.ManifestFile,
    TreatWarningsAsErrors: warningsAsErrors,
    Platforms: platforms,
  };
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(
  explicitPath: string | undefined,
  cwd: string
): { Config: FileConfig; Directory: string } | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return { Config: loadFile(fullPath), Directory: path.dirname(fullPath) };
    }
    throw new StrataError('INVALID_CONFIG', `Config file not found: ${fullPath}`);
  }

  // Search for config files
  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return { Config: loadFile(fullPath), Directory: cwd };
    }
  }

  return null;
}

/**
 * Loads a single config file (JSON or JS) and validates it.
 */
function loadFile(filePath: string): FileConfig {
  let raw: unknown;
  if (filePath.endsWith('.json')) {
    const content = fs.readFileSync(filePath, 'utf-8');
    raw = JSON.parse(content);
  } else {
    // JS/CJS files
    raw = require(filePath);
  }

  const result = FileConfigSchema.safeParse(normalizeConfigKeys(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw new StrataError(
      'INVALID_CONFIG',
      `Invalid config file ${filePath}: ${issue?.message ?? 'validation failed'}${where}`
    );
  }
  return result.data;
}

/**
 * Known config key mappings from camelCase to PascalCase.
 * Supports both casings in config files.
 */
const KEY_MAP: Record<string, string> = {
  sources: 'Sources',
  filePatterns: 'FilePatterns',
  manifestFile: 'ManifestFile',
  treatWarningsAsErrors: 'TreatWarningsAsErrors',
  platforms: 'Platforms',
};

/**
 * Normalizes top-level config keys from camelCase to PascalCase.
 * Keys already in PascalCase are left unchanged, and unknown keys are kept
 * so that validation can report them.
 */
function normalizeConfigKeys(obj: unknown): unknown {
  if (typeof obj !== 'object' || obj === null || Array.isArray(obj)) {
    return obj;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    normalized[KEY_MAP[key] ?? key] = value;
  }
  return normalized;
}

function splitList(value: string | string[]): string[] {
  const items = typeof value === 'string' ? value.split(',') : value;
  return items.map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * A comma-separated option; undefined when unset or empty.
 */
function listOption(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = splitList(value);
  return items.length > 0 ? items : undefined;
}

/**
 * `true`/`1`/`yes` and `false`/`0`/`no`; undefined for anything else.
 */
function booleanOption(value: string | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }
  return undefined;
}

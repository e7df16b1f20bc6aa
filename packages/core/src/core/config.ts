/**
 * @module core/config
 * Strata configuration types and defaults.
 */

import { DEFAULT_FILE_PATTERNS, DEFAULT_MANIFEST_FILE } from '../loader/package-loader';

/**
 * Complete configuration for Strata operations.
 */
export interface StrataConfig {
  /**
   * Package directories, each holding one sub-directory per version.
   * A source may name a version with `@`: `./schema/orders@2.1`.
   *
   * @example `['./schema/orders']`
   */
  Sources: string[];

  /**
   * Glob patterns, relative to each version directory, for the schema
   * documents to read. Defaults to YAML and JSON files.
   */
  FilePatterns?: string[];

  /**
   * Name of the per-version manifest file.
   * Defaults to `'_manifest.yaml'`.
   */
  ManifestFile?: string;

  /**
   * When true, warnings block a plan the same way errors do.
   * Defaults to false.
   */
  TreatWarningsAsErrors?: boolean;

  /**
   * Preference-ordered platform names used to pick the SQL of raw SQL
   * changes. Defaults to `['all']`, which selects universal statements.
   */
  Platforms?: string[];
}

/**
 * Merges user-provided config with sensible defaults.
 * @param config - Configuration provided by the user
 * @returns Complete configuration with all defaults applied
 */
export function resolveConfig(config: StrataConfig): Required<StrataConfig> {
  return {
    Sources: config.Sources,
    FilePatterns: config.FilePatterns ?? DEFAULT_FILE_PATTERNS,
    ManifestFile: config.ManifestFile ?? DEFAULT_MANIFEST_FILE,
    TreatWarningsAsErrors: config.TreatWarningsAsErrors ?? false,
    Platforms: config.Platforms ?? ['all'],
  };
}

/**
 * @module loader/version-directory
 * Recognizes version directories and reads their optional manifest.
 *
 * Directory names follow the forms
 * - `1`, `1.2`        plain version
 * - `v1`, `v1.2`      with a `v` prefix
 * - `v3_add-prices`   with a description after an underscore
 *
 * A `_manifest.yaml` inside the directory may override the version, name the
 * parent version (`null` for an explicit root) and name the package.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse, YAMLError } from 'yaml';
import { z } from 'zod';
import { LoadError } from '../core/errors';
import { SchemaProblem } from '../model/problem';
import { SchemaVersionNumber } from '../version/version-number';

/**
 * Regex for version directory names.
 *
 * Groups:
 *  1. Dotted version number
 *  2. Description (after the first underscore), if any
 */
const DIRECTORY_PATTERN = /^[vV]?(\d+(?:\.\d+)*)(?:_(.*))?$/;

/**
 * A version parsed from a directory name.
 */
export interface VersionDirectoryName {
  Version: SchemaVersionNumber;

  /** Text after the underscore, with underscores and dashes shown as spaces */
  Description: string;
}

/**
 * Parses a version directory name; returns null when it is not one.
 *
 * @example
 * ```typescript
 * ParseVersionDirectoryName('v3_add-prices');
 * // { Version: 3, Description: 'add prices' }
 * ```
 */
export function ParseVersionDirectoryName(name: string): VersionDirectoryName | null {
  const match = name.match(DIRECTORY_PATTERN);
  if (!match) {
    return null;
  }
  return {
    Version: new SchemaVersionNumber(...match[1].split('.').map((d) => parseInt(d, 10))),
    Description: (match[2] ?? '').replace(/[_-]/g, ' ').trim(),
  };
}

// ─── Manifest ────────────────────────────────────────────────────────

const VersionValueSchema = z.union([z.string(), z.number()]);

const ManifestSchema = z
  .object({
    version: VersionValueSchema.optional(),
    parent: VersionValueSchema.nullable().optional(),
    package: z.string().min(1).optional(),
    description: z.string().optional(),
  })
  .strict();

/**
 * What a manifest declares. `Parent` is undefined when the manifest says
 * nothing about the parent, and null for an explicit root.
 */
export interface VersionManifest {
  Version?: SchemaVersionNumber;
  Parent?: SchemaVersionNumber | null;
  Package?: string;
  Description?: string;
  Problems: SchemaProblem[];
}

/**
 * Reads a manifest file. Unreadable or invalid values become problems.
 *
 * @throws LoadError if the file cannot be read
 */
export function ReadManifest(filePath: string): VersionManifest {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new LoadError(filePath, `cannot read manifest ${filePath}`, err instanceof Error ? err : undefined);
  }

  const sourceName = path.basename(filePath);
  const ret: VersionManifest = { Problems: [] };
  const problem = (message: string) => {
    ret.Problems.push({ Level: 'error', Message: message, SourceName: sourceName });
  };

  let data: unknown;
  try {
    data = parse(content);
  } catch (err) {
    if (err instanceof YAMLError) {
      problem(`cannot parse manifest: ${err.message}`);
      return ret;
    }
    throw err;
  }
  if (data === null || data === undefined) {
    return ret;
  }

  const result = ManifestSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    problem(`invalid manifest: ${issue?.message ?? 'validation failed'}${where}`);
    return ret;
  }

  const manifest = result.data;
  if (manifest.version !== undefined) {
    ret.Version = toVersion('version', manifest.version, problem);
  }
  if (manifest.parent === null) {
    ret.Parent = null;
  } else if (manifest.parent !== undefined) {
    ret.Parent = toVersion('parent version', manifest.parent, problem);
  }
  ret.Package = manifest.package;
  ret.Description = manifest.description;
  return ret;
}

/**
 * Converts a manifest value. An integer is a one-part version; a fractional
 * number is reported, since YAML reads `1.10` as `1.1`, and truncated.
 */
function toVersion(
  what: string,
  value: string | number,
  problem: (message: string) => void
): SchemaVersionNumber | undefined {
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      problem(`${what} must be a string`);
    }
    const whole = Math.floor(value);
    if (whole < 0) {
      problem(`${what} cannot be negative`);
      return undefined;
    }
    return new SchemaVersionNumber(whole);
  }
  const parsed = SchemaVersionNumber.Parse(value);
  if (parsed === null) {
    problem(`${what} does not match pattern: ${value}`);
    return undefined;
  }
  return parsed;
}

/**
 * @module loader/package-loader
 * Loads a package from a directory of version directories.
 *
 * Discovery reads only directory names and manifests. Each version is
 * registered as a lazy branch: its schema documents are read the first time
 * the branch's payload is requested.
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import { DuplicateBranchError, LoadError } from '../core/errors';
import { Change } from '../model/change';
import { SchemaProblem } from '../model/problem';
import { SchemaObject } from '../model/schema';
import { CreateSchemaVersion, SchemaVersion } from '../version/branch';
import { SchemaPackage } from '../version/package';
import { CompareDecimals, SchemaVersionNumber } from '../version/version-number';
import { ParseSchemaDocument } from './document';
import { ParseVersionDirectoryName, ReadManifest } from './version-directory';

/** Default glob patterns for schema documents within a version directory */
export const DEFAULT_FILE_PATTERNS = ['**/*.yaml', '**/*.yml', '**/*.json'];

/** Default manifest file name */
export const DEFAULT_MANIFEST_FILE = '_manifest.yaml';

/**
 * Options for {@link LoadPackage}.
 */
export interface LoadPackageOptions {
  /** Package name; defaults to the manifests' package, then the directory name */
  Package?: string;

  /** Glob patterns for schema documents, relative to each version directory */
  FilePatterns?: string[];

  /** Manifest file name */
  ManifestFile?: string;

  /** Called for directories that are skipped */
  OnWarning?: (message: string) => void;
}

/**
 * A loaded package and the problems found while assembling it.
 */
export interface LoadedPackage {
  Package: SchemaPackage;

  /** Absolute path of the package directory */
  Root: string;

  /** Package-level problems: unusable directories and missing parents */
  Problems: SchemaProblem[];
}

/**
 * One discovered version directory.
 */
interface VersionDirectory {
  Directory: string;
  Version: SchemaVersionNumber;

  /** Explicit parent from the manifest; undefined when not declared */
  Parent?: SchemaVersionNumber | null;

  PackageName?: string;
  Problems: SchemaProblem[];
}

/**
 * Discovers the version directories under `root` and assembles them into a
 * package. Versions without a declared parent take the previous version (in
 * version order) as their parent; the lowest version is the root.
 *
 * @throws LoadError if `root` is not a directory
 * @throws DuplicateBranchError if two directories declare the same version
 *
 * @example
 * ```typescript
 * const { Package } = await LoadPackage('./schema/orders');
 * const newest = Package.NewestVersion();
 * ```
 */
export async function LoadPackage(root: string, options: LoadPackageOptions = {}): Promise<LoadedPackage> {
  const resolvedRoot = path.resolve(root);
  if (!fs.existsSync(resolvedRoot) || !fs.statSync(resolvedRoot).isDirectory()) {
    throw new LoadError(resolvedRoot, `Package directory does not exist: ${resolvedRoot}`);
  }

  const manifestFile = options.ManifestFile ?? DEFAULT_MANIFEST_FILE;
  const problems: SchemaProblem[] = [];

  const names = await fg('*', { cwd: resolvedRoot, onlyDirectories: true, deep: 1 });
  names.sort();

  const found: VersionDirectory[] = [];
  for (const name of names) {
    const directory = path.join(resolvedRoot, name);
    const manifestPath = path.join(directory, manifestFile);
    const manifest = fs.existsSync(manifestPath) ? ReadManifest(manifestPath) : null;
    const version = manifest?.Version ?? ParseVersionDirectoryName(name)?.Version;

    if (version === undefined) {
      if (manifest) {
        problems.push({
          Level: 'error',
          Message: 'no version number in manifest, and directory name does not match pattern',
          SourceName: path.join(name, manifestFile),
        });
      } else {
        options.OnWarning?.(`Skipping directory without a version number: ${name}`);
      }
      continue;
    }

    found.push({
      Directory: directory,
      Version: version,
      Parent: manifest?.Parent,
      PackageName: manifest?.Package,
      Problems: manifest?.Problems ?? [],
    });
  }

  const packageName =
    options.Package ??
    found.find((f) => f.PackageName !== undefined)?.PackageName ??
    path.basename(resolvedRoot);

  const seen = new Set<string>();
  for (const entry of found) {
    if (seen.has(entry.Version.Key)) {
      throw new DuplicateBranchError(packageName, entry.Version.toString());
    }
    seen.add(entry.Version.Key);
  }

  found.sort((a, b) => CompareDecimals(a.Version, b.Version));

  const pkg = new SchemaPackage(packageName);
  let previous: SchemaVersionNumber | undefined;
  for (const entry of found) {
    if (entry.PackageName !== undefined && entry.PackageName !== packageName) {
      problems.push({
        Level: 'error',
        Message: `version ${entry.Version} declares package ${entry.PackageName}, expected ${packageName}`,
        SourceName: path.join(path.basename(entry.Directory), manifestFile),
      });
      continue;
    }

    // Without a declared parent, a version follows the last one registered
    const parent = entry.Parent === undefined
      ? previous
      : entry.Parent ?? undefined;
    previous = entry.Version;

    const filePatterns = options.FilePatterns ?? DEFAULT_FILE_PATTERNS;
    pkg.AddBranchLoader(
      (version) => LoadVersionDirectory(entry.Directory, packageName, version, {
        FilePatterns: filePatterns,
        ManifestFile: manifestFile,
        Problems: entry.Problems,
      }),
      entry.Version,
      parent
    );
  }

  for (const missing of pkg.UnresolvedBranchVersions) {
    problems.push({
      Level: 'error',
      Message: `parent version ${missing} was never found`,
      SourceName: resolvedRoot,
    });
  }

  return { Package: pkg, Root: resolvedRoot, Problems: problems };
}

/**
 * Options for {@link LoadVersionDirectory}.
 */
export interface LoadVersionOptions {
  FilePatterns?: string[];
  ManifestFile?: string;

  /** Problems already known for this version, such as manifest problems */
  Problems?: SchemaProblem[];
}

/**
 * Reads every schema document in a version directory, in path order, into a
 * version record. The file's position in that order is the first number of
 * every Order read from it.
 *
 * @throws LoadError if a document cannot be read
 */
export function LoadVersionDirectory(
  directory: string,
  pkg: string,
  version: SchemaVersionNumber,
  options: LoadVersionOptions = {}
): SchemaVersion {
  const manifestFile = options.ManifestFile ?? DEFAULT_MANIFEST_FILE;
  const files = fg.sync(options.FilePatterns ?? DEFAULT_FILE_PATTERNS, {
    cwd: directory,
    onlyFiles: true,
    ignore: [`**/${manifestFile}`],
  });
  files.sort();

  const topChanges: Change[] = [];
  const schema: SchemaObject[] = [];
  const problems: SchemaProblem[] = [...(options.Problems ?? [])];

  files.forEach((file, rank) => {
    const filePath = path.join(directory, file);
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new LoadError(filePath, `cannot read schema file ${filePath}`, err instanceof Error ? err : undefined);
    }
    const parsed = ParseSchemaDocument(content, file, rank);
    topChanges.push(...parsed.TopChanges);
    schema.push(...parsed.Schema);
    problems.push(...parsed.Problems);
  });

  return CreateSchemaVersion(pkg, version, topChanges, schema, problems);
}

/**
 * A package source with an optional version: `dir` or `dir@1.2`.
 */
export interface SourceSpec {
  Directory: string;
  Version?: string;
}

/**
 * Splits `dir@1.2` into its directory and version. A trailing `@...` that is
 * not a version number is treated as part of the directory.
 */
export function ParseSourceSpec(spec: string): SourceSpec {
  const at = spec.lastIndexOf('@');
  if (at > 0) {
    const version = spec.slice(at + 1);
    if (SchemaVersionNumber.Parse(version) !== null) {
      return { Directory: spec.slice(0, at), Version: version };
    }
  }
  return { Directory: spec };
}

/**
 * @module core/errors
 * Custom error types for Strata operations.
 *
 * Authoring mistakes in schema descriptions are never thrown: they are
 * collected as problems. The classes here cover the fatal cases that abort
 * a single operation.
 */

/**
 * Base error class for all Strata errors.
 * Provides a consistent error hierarchy with error codes for programmatic handling.
 */
export class StrataError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'StrataError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when an Order is built from anything other than three integers.
 */
export class InvalidOrderError extends StrataError {
  /** The rejected value, as given */
  readonly Value: readonly unknown[];

  constructor(value: readonly unknown[], message: string) {
    super('INVALID_ORDER', message);
    this.name = 'InvalidOrderError';
    this.Value = value;
  }
}

/**
 * Thrown by `Order.FullSort` when the before/after constraints form a loop.
 */
export class CyclicOrderError extends StrataError {
  /**
   * The nodes on the active traversal path when the loop closed, rendered as
   * strings (orders as `(a, b, c)`, labels as-is).
   */
  readonly Cycle: string[];

  constructor(cycle: string[]) {
    super(
      'CYCLIC_ORDER',
      `cyclic dependency in orders: ${cycle.join(' -> ')}`
    );
    this.name = 'CyclicOrderError';
    this.Cycle = cycle;
  }
}

/**
 * Thrown when a branch is registered twice in the same package.
 */
export class DuplicateBranchError extends StrataError {
  /** Package name */
  readonly Package: string;

  /** Dotted version string of the duplicate */
  readonly Version: string;

  constructor(pkg: string, version: string) {
    super('DUPLICATE_BRANCH', `Already added branch ${pkg} : ${version}`);
    this.name = 'DuplicateBranchError';
    this.Package = pkg;
    this.Version = version;
  }
}

/**
 * Thrown when the diff dispatcher receives a value that is not one of the
 * known schema object variants. Only reachable from untyped input.
 */
export class UnknownSchemaKindError extends StrataError {
  constructor(kind: string) {
    super('UNKNOWN_SCHEMA_KIND', `Don't know how to upgrade a ${kind}`);
    this.name = 'UnknownSchemaKindError';
  }
}

/**
 * Thrown when a version directory or schema document cannot be read at all.
 */
export class LoadError extends StrataError {
  /** The file or directory that failed */
  readonly Location: string;

  constructor(location: string, message: string, cause?: Error) {
    super('LOAD_FAILED', message, cause);
    this.name = 'LoadError';
    this.Location = location;
  }
}

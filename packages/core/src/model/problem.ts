/**
 * @module model/problem
 * Problems found while reading a schema version.
 */

/**
 * Severity of a problem.
 *
 * - `'fatal'`: the item could not be understood at all and was dropped
 * - `'error'`: an authoring mistake that blocks generation
 * - `'warning'`: an omission that is safe to proceed with
 * - `'note'`: informational
 */
export type ProblemLevel = 'fatal' | 'error' | 'warning' | 'note';

/**
 * A parse-time or definition problem attached to a schema version.
 */
export interface SchemaProblem {
  Level: ProblemLevel;

  Message: string;

  /** File (or other source) the problem was found in */
  SourceName: string;

  /** Position within the source, e.g. `"tables[2].columns[0]"`; absent when unknown */
  SourcePosition?: string;
}

/**
 * Renders the source name and, when known, the position: `file @ position`.
 */
export function FormatProblemLocation(problem: SchemaProblem): string {
  return problem.SourcePosition
    ? `${problem.SourceName} @ ${problem.SourcePosition}`
    : problem.SourceName;
}

/**
 * True for levels that block generation.
 */
export function IsBlockingLevel(level: ProblemLevel): boolean {
  return level === 'fatal' || level === 'error';
}

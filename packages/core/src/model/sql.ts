/**
 * @module model/sql
 * Authored SQL snippets for one or more database platforms.
 */

/**
 * One SQL statement and the platforms it applies to.
 */
export interface SqlStatement {
  /** Raw SQL text, passed through unchanged */
  Sql: string;

  /** Grammar of the statement, lower-cased (`'universal'` when unspecified) */
  Syntax: string;

  /** Lower-cased platform names (`'all'` or `'any'` match every platform) */
  Platforms: string[];
}

/**
 * The platform variants of a single piece of SQL.
 */
export interface SqlSet {
  Statements: SqlStatement[];
}

/**
 * Builds a statement, normalizing syntax and platform names.
 */
export function CreateSqlStatement(
  sql: string,
  syntax: string = 'universal',
  platforms: readonly string[] = ['all']
): SqlStatement {
  return {
    Sql: sql,
    Syntax: syntax.trim().toLowerCase(),
    Platforms: platforms.map((p) => p.trim().toLowerCase()).filter((p) => p.length > 0),
  };
}

/**
 * Shorthand for a set holding a single universal statement.
 */
export function UniversalSql(sql: string): SqlSet {
  return { Statements: [CreateSqlStatement(sql)] };
}

/**
 * Returns the most appropriate statement for the requested platforms.
 *
 * Platforms are tried in the order given; the first statement listing one of
 * them wins. Failing that, the first universal (or `all`/`any`) statement is
 * returned.
 *
 * @param set - The SQL variants
 * @param platforms - One platform name or a preference-ordered list
 * @returns The matching statement, or undefined when nothing applies
 */
export function SqlForPlatform(
  set: SqlSet,
  platforms: string | readonly string[]
): SqlStatement | undefined {
  const wanted = typeof platforms === 'string' ? [platforms] : platforms;

  for (const platform of wanted) {
    const normalized = platform.trim().toLowerCase();
    const match = set.Statements.find((s) => s.Platforms.includes(normalized));
    if (match) {
      return match;
    }
  }

  return set.Statements.find(
    (s) => s.Syntax === 'universal' || s.Platforms.includes('any') || s.Platforms.includes('all')
  );
}

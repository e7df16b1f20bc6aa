/**
 * @module version/version-number
 * Dewey-decimal schema version numbers such as `1`, `1.2` or `2.0.3`.
 */

/**
 * Pattern for a version in text form: optional `v`, then dot-separated
 * non-negative integers.
 */
const VERSION_TEXT_PATTERN = /^v?(\d+(?:\.\d+)*)$/i;

/**
 * An immutable tuple of non-negative integers.
 *
 * Equality is by value; {@link SchemaVersionNumber.Key} gives a string that
 * is equal exactly when the versions are equal, for use as a map key.
 */
export class SchemaVersionNumber {
  private readonly decimals: readonly number[];

  /**
   * @throws RangeError if any component is not a non-negative integer
   */
  constructor(...decimals: number[]) {
    for (const value of decimals) {
      if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`version numbers must be non-negative integers, found ${value}`);
      }
    }
    this.decimals = [...decimals];
  }

  /**
   * Parses `"1.2.3"` or `"v1.2"`; returns null when the text does not match.
   */
  static Parse(text: string): SchemaVersionNumber | null {
    const match = text.trim().match(VERSION_TEXT_PATTERN);
    if (!match) {
      return null;
    }
    return new SchemaVersionNumber(...match[1].split('.').map((d) => parseInt(d, 10)));
  }

  get Decimals(): readonly number[] {
    return this.decimals;
  }

  get Depth(): number {
    return this.decimals.length;
  }

  /** Map key for this version: the dotted form */
  get Key(): string {
    return this.toString();
  }

  /**
   * Compares two versions. Negative when this is earlier, positive when
   * later, 0 when equal.
   *
   * Components are compared left to right. When `other` runs out of
   * components first, this version is reported as the earlier one; when this
   * version runs out first, the difference in depth decides. The two rules
   * are not mirror images: `1.2.3` compares before `1.2`, and `1.2` compares
   * before `1.2.3`.
   */
  CompareTo(other: SchemaVersionNumber): number {
    for (let idx = 0; idx < this.decimals.length; idx++) {
      if (idx >= other.decimals.length) {
        return -1;
      }
      const diff = this.decimals[idx] - other.decimals[idx];
      if (diff !== 0) {
        return diff;
      }
    }
    return this.decimals.length - other.decimals.length;
  }

  IsBefore(other: SchemaVersionNumber): boolean {
    return this.CompareTo(other) < 0;
  }

  IsAfter(other: SchemaVersionNumber): boolean {
    return this.CompareTo(other) > 0;
  }

  Equals(other: SchemaVersionNumber): boolean {
    return this.CompareTo(other) === 0;
  }

  /**
   * True when `other` starts with all of this version's numbers and has
   * more after them (`1.2` is the parent decimal of `1.2.5`).
   */
  IsParentDecimalOf(other: SchemaVersionNumber): boolean {
    if (other.Depth <= this.Depth) {
      return false;
    }
    return this.decimals.every((value, idx) => other.decimals[idx] === value);
  }

  /**
   * True when both versions have the same depth and agree on every number
   * but the last (`1.2.3` and `1.2.7`).
   */
  IsSiblingDecimalOf(other: SchemaVersionNumber): boolean {
    if (other.Depth !== this.Depth) {
      return false;
    }
    for (let idx = 0; idx < this.Depth - 1; idx++) {
      if (other.decimals[idx] !== this.decimals[idx]) {
        return false;
      }
    }
    return true;
  }

  /**
   * True when `text` parses to this version.
   */
  Matches(text: string): boolean {
    const parsed = SchemaVersionNumber.Parse(text);
    return parsed !== null && this.Equals(parsed);
  }

  toString(): string {
    return this.decimals.join('.');
  }
}

/**
 * Comparator for `Array.prototype.sort`.
 */
export function CompareVersions(a: SchemaVersionNumber, b: SchemaVersionNumber): number {
  return a.CompareTo(b);
}

/**
 * Component-wise comparison where a version sorts before every longer
 * version it is a prefix of (`1.2` < `1.2.3` < `1.3`). Unlike
 * {@link SchemaVersionNumber.CompareTo} this is a total order, so it is what
 * listings and the directory loader sort by.
 */
export function CompareDecimals(a: SchemaVersionNumber, b: SchemaVersionNumber): number {
  const depth = Math.min(a.Depth, b.Depth);
  for (let idx = 0; idx < depth; idx++) {
    const diff = a.Decimals[idx] - b.Decimals[idx];
    if (diff !== 0) {
      return diff;
    }
  }
  return a.Depth - b.Depth;
}

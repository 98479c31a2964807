/**
 * Version comparison for Maven-style version strings.
 *
 * Maven artifacts do not follow semver consistently (`1.0`, `2.13.12`,
 * `3.0.0-RC1`, `1.5.5-M1`, `4.5.5.5`, `5.2.0.Final`), so versions are
 * compared segment by segment instead of being parsed as semver.
 *
 * ## Segments
 *
 * A version is split on non-alphanumeric characters and on digit/letter
 * boundaries: `2.0.0-RC1` becomes `2`, `0`, `0`, `RC`, `1`.
 *
 * ## Ordering
 *
 * 1. Numeric segments compare numerically
 * 2. Textual segments compare case-insensitively
 * 3. A number is greater than text at the same position
 * 4. A missing segment counts as `0`, so it is greater than any qualifier
 *    (`1.0` > `1.0-RC1`, `1.0` > `1.0.Final`) and `1.0` equals `1.0.0`
 *
 * @module
 */

/** Upgrade size derived from the first differing segment. */
export type UpdateRank = 'Major' | 'Minor' | 'Patch' | 'Unknown';

/**
 * One segment of a version string.
 */
export type VersionSegment =
  | { kind: 'number'; text: string; value: bigint }
  | { kind: 'text'; text: string; value: string };

/**
 * Represents a parsed version.
 */
export interface ParsedVersion {
  /** Original version string */
  original: string;

  /** Segments in order */
  segments: VersionSegment[];

  /** Whether any segment is a pre-release marker */
  isPreRelease: boolean;
}

/**
 * Qualifiers that mark a version as not yet released.
 */
export const PRE_RELEASE_MARKERS: ReadonlySet<string> = new Set([
  'alpha',
  'a',
  'beta',
  'b',
  'milestone',
  'm',
  'rc',
  'cr',
  'snapshot',
  'preview',
  'pre',
  'dev',
  'ea',
]);

const SEGMENT = /\d+|[^\W\d_]+/gu;

const RANKS: UpdateRank[] = ['Major', 'Minor', 'Patch'];

/**
 * Segment-wise version comparison.
 *
 * @example Basic comparison
 * ```typescript
 * const comparator = new VersionComparator();
 *
 * comparator.compare('1.2.0', '1.10.0'); // -1
 * comparator.compare('2.0.0', '2.0.0-RC1'); // 1
 * comparator.compare('1.0', '1.0.0'); // 0
 * ```
 *
 * @example Rank an upgrade
 * ```typescript
 * comparator.rank('1.2.0', '2.0.0'); // 'Major'
 * comparator.rank('1.2.0', '1.2.1'); // 'Patch'
 * comparator.rank('5.2.0.Final', '5.2.0.GA'); // 'Unknown'
 * ```
 */
export class VersionComparator {
  /**
   * Parse a version string into segments.
   */
  parse(version: string): ParsedVersion {
    const segments: VersionSegment[] = [];

    for (const match of version.matchAll(SEGMENT)) {
      const text = match[0];

      segments.push(
        /^\d+$/.test(text)
          ? { kind: 'number', text, value: BigInt(text) }
          : { kind: 'text', text, value: text.toLowerCase() },
      );
    }

    return {
      original: version,
      segments,
      isPreRelease: segments.some((s) => s.kind === 'text' && isPreReleaseMarker(s.value)),
    };
  }

  /**
   * Compare two versions.
   *
   * @returns -1 if a < b, 0 if equal, 1 if a > b
   */
  compare(a: string, b: string): number {
    const left = this.parse(a).segments;
    const right = this.parse(b).segments;
    const length = Math.max(left.length, right.length);

    for (let i = 0; i < length; i++) {
      const result = compareSegments(left[i], right[i]);
      if (result !== 0) return result;
    }

    return 0;
  }

  /**
   * Check if candidate version is newer than current version.
   */
  isNewer(current: string, candidate: string): boolean {
    return this.compare(current, candidate) < 0;
  }

  /**
   * Whether the version carries a pre-release marker (`-RC1`, `-M2`, `-SNAPSHOT`).
   */
  isPreRelease(version: string): boolean {
    return this.parse(version).isPreRelease;
  }

  /**
   * Classify the step from `current` to `proposed`.
   *
   * The first differing segment decides: position 0 is Major, 1 Minor,
   * 2 Patch. Anything further along, or a difference involving
   * non-numeric segments, is Unknown.
   */
  rank(current: string, proposed: string): UpdateRank {
    const left = this.parse(current).segments;
    const right = this.parse(proposed).segments;
    const length = Math.max(left.length, right.length);

    for (let i = 0; i < length; i++) {
      const a = left[i];
      const b = right[i];

      if (!isNumericOrMissing(a) || !isNumericOrMissing(b)) return 'Unknown';
      if (compareSegments(a, b) === 0) continue;

      return RANKS[i] ?? 'Unknown';
    }

    return 'Unknown';
  }

  /**
   * Sort versions ascending. Versions comparing equal keep a stable,
   * string-ordered position.
   */
  sort(versions: readonly string[]): string[] {
    return [...versions].sort((a, b) => this.compare(a, b) || (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Find the greatest version in a list.
   */
  max(versions: readonly string[]): string | undefined {
    return this.sort(versions).at(-1);
  }
}

/**
 * Whether a lower-cased text segment is a pre-release marker.
 */
export function isPreReleaseMarker(segment: string): boolean {
  return PRE_RELEASE_MARKERS.has(segment);
}

function isNumericOrMissing(segment: VersionSegment | undefined): boolean {
  return segment === undefined || segment.kind === 'number';
}

function compareSegments(
  a: VersionSegment | undefined,
  b: VersionSegment | undefined,
): number {
  if (a === undefined && b === undefined) return 0;
  if (a === undefined) return -compareToMissing(b);
  if (b === undefined) return compareToMissing(a);

  if (a.kind === 'number' && b.kind === 'number') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }

  if (a.kind === 'text' && b.kind === 'text') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }

  return a.kind === 'number' ? 1 : -1;
}

/**
 * Compare a present segment against a missing one.
 */
function compareToMissing(segment: VersionSegment | undefined): number {
  if (segment === undefined) return 0;

  if (segment.kind === 'number') {
    return segment.value > 0n ? 1 : 0;
  }

  // Same as against a padded `0`: text sorts below numbers.
  return -1;
}

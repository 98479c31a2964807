/**
 * Dependency coordinates as they appear in sbt build definitions.
 *
 * A coordinate is the identity of a dependency: `"group" %% "artifact"`
 * plus the scope/configuration that follows the version. Two coordinates
 * are the same dependency only when every field matches exactly.
 *
 * @module
 */

/**
 * Operator between group and artifact.
 *
 * - `%` plain (Java) artifact, resolved by its literal name
 * - `%%` Scala artifact, resolved with a binary-version suffix (`_2.13`)
 * - `%%%` Scala.js / Native artifact (`_sjs1_2.13`)
 */
export type CrossSeparator = '%' | '%%' | '%%%';

/** Where the coordinate was declared. */
export type CoordinateTarget = 'library' | 'plugin';

/**
 * Immutable identity of a dependency.
 */
export interface Coordinate {
  readonly group: string;
  readonly artifact: string;
  readonly separator: CrossSeparator;
  readonly target: CoordinateTarget;

  /** Trailing configuration (`Test`, `"provided"`), undefined for compile scope */
  readonly scope?: string;
}

/**
 * Half-open `[start, end)` range of UTF-16 offsets into a source text.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/**
 * Build a frozen coordinate.
 */
export function createCoordinate(fields: Coordinate): Coordinate {
  return Object.freeze({ ...fields });
}

/**
 * Stable key used for de-duplication, caching and result maps.
 */
export function coordinateKey(coordinate: Coordinate): string {
  return [
    coordinate.target,
    coordinate.group,
    coordinate.separator,
    coordinate.artifact,
    coordinate.scope ?? '',
  ].join('\u0000');
}

/**
 * Human-readable form, e.g. `"dev.zio" %% "zio" % Test`.
 */
export function formatCoordinate(coordinate: Coordinate): string {
  const base = `${coordinate.group} ${coordinate.separator} ${coordinate.artifact}`;
  return coordinate.scope ? `${base} (${coordinate.scope})` : base;
}

/**
 * Scala binary versions tried for `%%` artifacts when the build does not
 * declare a Scala version.
 */
const DEFAULT_SCALA_SUFFIXES = ['_2.13', '_3', '_2.12', ''];

/**
 * Artifact suffix an sbt 1.x plugin is published with.
 */
const SBT_PLUGIN_SUFFIX = '_2.12_1.0';

/**
 * Suffixes for a Scala-cross-built artifact, most likely first.
 *
 * @param scalaVersion - Version from `scalaVersion := ...`, if any
 */
export function scalaSuffixes(scalaVersion?: string): string[] {
  if (!scalaVersion) return [...DEFAULT_SCALA_SUFFIXES];

  const [major, minor] = scalaVersion.split('.');

  if (major === '3') return ['_3', '_2.13', '_2.12', ''];
  if (major === '2' && minor === '13') return ['_2.13', '_2.12', ''];
  if (major === '2' && minor === '12') return ['_2.12', ''];

  return [...DEFAULT_SCALA_SUFFIXES];
}

/**
 * Published artifact names to try, in order, for a coordinate.
 *
 * @example
 * ```typescript
 * artifactNames(zioCoordinate, '3.4.2');
 * // ['zio_3', 'zio_2.13', 'zio_2.12', 'zio']
 * ```
 */
export function artifactNames(
  coordinate: Coordinate,
  scalaVersion?: string,
): string[] {
  const { artifact } = coordinate;

  if (coordinate.target === 'plugin') {
    return [`${artifact}${SBT_PLUGIN_SUFFIX}`, artifact];
  }

  if (coordinate.separator === '%') {
    return [artifact];
  }

  const suffixes = scalaSuffixes(scalaVersion);

  if (coordinate.separator === '%%%') {
    const platform = suffixes
      .filter((suffix) => suffix !== '')
      .map((suffix) => `${artifact}_sjs1${suffix}`);

    return [...platform, ...suffixes.map((suffix) => `${artifact}${suffix}`)];
  }

  return suffixes.map((suffix) => `${artifact}${suffix}`);
}

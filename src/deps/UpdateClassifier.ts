/**
 * Decides whether a coordinate has an upgrade and how large it is.
 *
 * @module
 */

import type { Coordinate } from './Coordinate.ts';
import type { VersionSet } from './RegistryClient.ts';
import { type UpdateRank, VersionComparator } from './VersionComparator.ts';

/**
 * A proposed upgrade for one coordinate.
 */
export interface UpdateCandidate {
  readonly coordinate: Coordinate;

  /** Version currently declared */
  readonly current: string;

  /** Version the upgrade would write */
  readonly proposed: string;

  readonly rank: UpdateRank;

  /** Highest qualifying version per rank, ordered Major, Minor, Patch, Unknown */
  readonly alternatives: readonly UpdateAlternative[];
}

export interface UpdateAlternative {
  readonly version: string;
  readonly rank: UpdateRank;
}

export interface ClassifyOptions {
  /** Consider `-RC1`, `-M2`, `-SNAPSHOT` and similar versions */
  includePreRelease?: boolean;
}

const RANK_ORDER: UpdateRank[] = ['Major', 'Minor', 'Patch', 'Unknown'];

/**
 * Computes the upgrade candidate for a declared version.
 *
 * @example
 * ```typescript
 * const classifier = new UpdateClassifier();
 * const candidate = classifier.classify('1.2.0', {
 *   coordinate,
 *   versions: ['1.2.0', '1.3.0', '2.0.0', '2.0.0-RC1'],
 * });
 *
 * candidate?.proposed; // '2.0.0'
 * candidate?.rank; // 'Major'
 * ```
 */
export class UpdateClassifier {
  constructor(protected comparator = new VersionComparator()) {}

  /**
   * Classify `current` against the published versions.
   *
   * @returns The candidate, or undefined when nothing newer qualifies
   */
  classify(
    current: string,
    versionSet: VersionSet,
    options: ClassifyOptions = {},
  ): UpdateCandidate | undefined {
    const qualifying = versionSet.versions.filter((version) =>
      this.comparator.isNewer(current, version) &&
      (options.includePreRelease || !this.comparator.isPreRelease(version))
    );

    const proposed = this.comparator.max(qualifying);
    if (proposed === undefined) return undefined;

    const best = new Map<UpdateRank, string>();
    for (const version of this.comparator.sort(qualifying)) {
      best.set(this.comparator.rank(current, version), version);
    }

    const alternatives = RANK_ORDER.flatMap((rank) => {
      const version = best.get(rank);
      return version === undefined ? [] : [Object.freeze({ version, rank })];
    });

    return Object.freeze({
      coordinate: versionSet.coordinate,
      current,
      proposed,
      rank: this.comparator.rank(current, proposed),
      alternatives: Object.freeze(alternatives),
    });
  }
}

/**
 * A copy of `candidate` proposing one of its alternatives instead.
 *
 * @throws Error when `version` is not one of the candidate's alternatives
 */
export function retargetCandidate(
  candidate: UpdateCandidate,
  version: string,
): UpdateCandidate {
  const alternative = candidate.alternatives.find((alt) => alt.version === version);
  if (!alternative) {
    throw new Error(
      `${version} is not an upgrade option for ${candidate.coordinate.artifact}`,
    );
  }

  return Object.freeze({
    ...candidate,
    proposed: alternative.version,
    rank: alternative.rank,
  });
}

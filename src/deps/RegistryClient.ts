/**
 * Contract between the resolver and whatever serves published versions.
 *
 * @module
 */

import { type Coordinate, formatCoordinate } from './Coordinate.ts';

/**
 * Published versions for one coordinate.
 */
export interface VersionSet {
  readonly coordinate: Coordinate;
  readonly versions: readonly string[];
}

/**
 * Why a lookup failed.
 *
 * - `NotFound` the registry has no artifact under any candidate name
 * - `Network` transport failure, timeout, throttling or server error
 * - `Malformed` the registry answered with something unreadable
 */
export type RegistryErrorKind = 'NotFound' | 'Network' | 'Malformed';

export class RegistryError extends Error {
  override readonly name = 'RegistryError';
  readonly kind: RegistryErrorKind;
  readonly coordinate: Coordinate;

  constructor(
    kind: RegistryErrorKind,
    coordinate: Coordinate,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${formatCoordinate(coordinate)}: ${detail}`, options);
    this.kind = kind;
    this.coordinate = coordinate;
  }

  /** Only transient failures are worth another attempt. */
  get Retryable(): boolean {
    return this.kind === 'Network';
  }
}

/**
 * Raised by `resolveAll` when its signal aborts. Partial results are dropped.
 */
export class ResolutionCancelledError extends Error {
  override readonly name = 'ResolutionCancelledError';

  constructor() {
    super('Version resolution was cancelled');
  }
}

/**
 * Source of published versions.
 */
export interface RegistryClient {
  /**
   * @throws RegistryError on lookup failure
   */
  fetchVersions(coordinate: Coordinate, signal?: AbortSignal): Promise<string[]>;
}

/**
 * Concurrent version lookup for every coordinate in a build.
 *
 * A fixed number of workers pull coordinates from a shared queue, so a
 * build with hundreds of dependencies never opens more than
 * `concurrency` requests at once. Results are cached for the lifetime of
 * the resolver (one run) and never re-fetched.
 *
 * @module
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { type Coordinate, coordinateKey, formatCoordinate } from './Coordinate.ts';
import {
  type RegistryClient,
  RegistryError,
  ResolutionCancelledError,
  type VersionSet,
} from './RegistryClient.ts';

/**
 * Outcome of one coordinate's lookup.
 */
export type ResolutionOutcome =
  | { status: 'resolved'; versionSet: VersionSet }
  | { status: 'failed'; coordinate: Coordinate; error: RegistryError };

/**
 * Outcomes keyed by {@link coordinateKey}.
 */
export type ResolutionReport = Map<string, ResolutionOutcome>;

/**
 * Minimal logger the resolver reports retries through.
 */
export interface ResolverLogger {
  Debug: (...args: unknown[]) => void;
}

export interface RegistryResolverOptions {
  /** Worker count (default: 8) */
  concurrency?: number;

  /** Extra attempts for Network failures (default: 2) */
  retries?: number;

  /** Delay before the first retry, doubled each time (default: 250) */
  retryBackoffMs?: number;

  /** Called as each coordinate finishes, for progress output */
  onSettled?: (outcome: ResolutionOutcome, done: number, total: number) => void;

  log?: ResolverLogger;
}

/**
 * Resolves published versions through a {@link RegistryClient}.
 *
 * @example
 * ```typescript
 * const resolver = new RegistryResolver(new MavenCentralClient(), { concurrency: 4 });
 * const report = await resolver.resolveAll(coordinates, controller.signal);
 *
 * for (const [key, outcome] of report) {
 *   if (outcome.status === 'failed') console.log(outcome.error.kind);
 * }
 * ```
 */
export class RegistryResolver {
  protected cache = new Map<string, VersionSet>();
  protected inFlight = new Map<string, Promise<VersionSet>>();

  protected concurrency: number;
  protected retries: number;
  protected retryBackoffMs: number;

  constructor(
    protected client: RegistryClient,
    protected options: RegistryResolverOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.retries = Math.max(0, options.retries ?? 2);
    this.retryBackoffMs = Math.max(0, options.retryBackoffMs ?? 250);
  }

  /**
   * Resolve one coordinate, from cache when already fetched this run.
   *
   * @throws RegistryError when the lookup fails after retries
   * @throws ResolutionCancelledError when `signal` aborts
   */
  resolve(coordinate: Coordinate, signal?: AbortSignal): Promise<VersionSet> {
    const key = coordinateKey(coordinate);

    const cached = this.cache.get(key);
    if (cached) return Promise.resolve(cached);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const lookup = this.fetchWithRetry(coordinate, signal)
      .then((versions) => {
        const versionSet: VersionSet = Object.freeze({
          coordinate,
          versions: Object.freeze([...versions]),
        });

        if (!this.cache.has(key)) this.cache.set(key, versionSet);
        return versionSet;
      })
      .finally(() => this.inFlight.delete(key));

    this.inFlight.set(key, lookup);
    return lookup;
  }

  /**
   * Resolve every distinct coordinate with at most `concurrency` lookups
   * in flight. A failed coordinate is recorded and does not stop the others.
   *
   * @throws ResolutionCancelledError when `signal` aborts; no partial report is returned
   */
  async resolveAll(
    coordinates: Coordinate[],
    signal?: AbortSignal,
  ): Promise<ResolutionReport> {
    const queue = new Map<string, Coordinate>();
    for (const coordinate of coordinates) {
      const key = coordinateKey(coordinate);
      if (!queue.has(key)) queue.set(key, coordinate);
    }

    const pending = [...queue.entries()];
    const report: ResolutionReport = new Map();
    const total = pending.length;
    let done = 0;

    const worker = async (): Promise<void> => {
      for (let next = pending.shift(); next; next = pending.shift()) {
        if (signal?.aborted) return;

        const [key, coordinate] = next;
        const outcome = await this.settle(coordinate, signal);
        if (signal?.aborted) return;

        report.set(key, outcome);
        done++;
        this.options.onSettled?.(outcome, done, total);
      }
    };

    if (signal?.aborted) throw new ResolutionCancelledError();

    const workers = Array.from(
      { length: Math.min(this.concurrency, total) },
      () => worker(),
    );

    const cancelled = whenAborted(signal);
    try {
      await Promise.race([Promise.all(workers), cancelled.promise]);
    } finally {
      cancelled.dispose();
    }

    if (signal?.aborted) throw new ResolutionCancelledError();

    // Report in input order, independent of completion order.
    return new Map(
      [...queue.keys()].flatMap((key) => {
        const outcome = report.get(key);
        return outcome ? [[key, outcome] as const] : [];
      }),
    );
  }

  protected async settle(
    coordinate: Coordinate,
    signal?: AbortSignal,
  ): Promise<ResolutionOutcome> {
    try {
      return { status: 'resolved', versionSet: await this.resolve(coordinate, signal) };
    } catch (error) {
      if (error instanceof RegistryError) {
        return { status: 'failed', coordinate, error };
      }

      return {
        status: 'failed',
        coordinate,
        error: new RegistryError(
          'Network',
          coordinate,
          error instanceof Error ? error.message : String(error),
          { cause: error },
        ),
      };
    }
  }

  protected async fetchWithRetry(
    coordinate: Coordinate,
    signal?: AbortSignal,
  ): Promise<string[]> {
    for (let attempt = 0;; attempt++) {
      if (signal?.aborted) throw new ResolutionCancelledError();

      try {
        return await this.client.fetchVersions(coordinate, signal);
      } catch (error) {
        if (
          !(error instanceof RegistryError) ||
          !error.Retryable ||
          attempt >= this.retries ||
          signal?.aborted
        ) {
          throw error;
        }

        const delay = this.retryBackoffMs * 2 ** attempt;
        this.options.log?.Debug(
          `Retrying ${formatCoordinate(coordinate)} in ${delay}ms (${error.message})`,
        );

        try {
          await sleep(delay, undefined, { signal });
        } catch {
          throw new ResolutionCancelledError();
        }
      }
    }
  }
}

/**
 * A promise that rejects once `signal` aborts. Never settles otherwise.
 */
function whenAborted(signal?: AbortSignal): { promise: Promise<never>; dispose: () => void } {
  if (!signal) return { promise: new Promise<never>(() => {}), dispose: () => {} };

  let onAbort = () => {};
  const promise = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new ResolutionCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return {
    promise,
    dispose: () => signal.removeEventListener('abort', onAbort),
  };
}

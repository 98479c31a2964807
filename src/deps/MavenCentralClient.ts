/**
 * Registry client for Maven repositories.
 *
 * Versions are read from the artifact's `maven-metadata.xml`:
 *
 * ```
 * https://repo1.maven.org/maven2/dev/zio/zio_2.13/maven-metadata.xml
 * ```
 *
 * Scala artifacts are published under a cross-version suffix that the
 * build text does not spell out, so each candidate name from
 * {@link artifactNames} is tried in order until one exists.
 *
 * @module
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { artifactNames, type Coordinate } from './Coordinate.ts';
import {
  type RegistryClient,
  RegistryError,
  ResolutionCancelledError,
} from './RegistryClient.ts';

export const DEFAULT_REGISTRY_URL = 'https://repo1.maven.org/maven2';

/**
 * Options for {@link MavenCentralClient}.
 */
export interface MavenCentralClientOptions {
  /** Repository root (default: Maven Central) */
  baseUrl?: string;

  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;

  /** Scala version of the build, used to order cross-version suffixes */
  scalaVersion?: string;

  /** Fetch implementation, replaced in tests */
  fetch?: typeof fetch;
}

const MetadataSchema = z.object({
  metadata: z.object({
    versioning: z.object({
      versions: z.object({
        version: z.array(z.string()),
      }),
    }),
  }),
});

const MISSING_STATUSES = new Set([404, 410]);

/**
 * Fetches published versions from a Maven repository.
 *
 * @example
 * ```typescript
 * const client = new MavenCentralClient({ scalaVersion: '2.13.12' });
 * const versions = await client.fetchVersions(zioCoordinate);
 * ```
 */
export class MavenCentralClient implements RegistryClient {
  protected baseUrl: string;
  protected timeoutMs: number;
  protected scalaVersion?: string;
  protected fetcher: typeof fetch;

  protected parser = new XMLParser({
    parseTagValue: false,
    isArray: (_name, jpath) => jpath === 'metadata.versioning.versions.version',
  });

  constructor(options: MavenCentralClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_REGISTRY_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.scalaVersion = options.scalaVersion;
    this.fetcher = options.fetch ?? fetch;
  }

  async fetchVersions(coordinate: Coordinate, signal?: AbortSignal): Promise<string[]> {
    const names = artifactNames(coordinate, this.scalaVersion);

    for (const name of names) {
      const body = await this.fetchMetadata(coordinate, name, signal);
      if (body === undefined) continue;

      return this.parseMetadata(coordinate, body);
    }

    throw new RegistryError(
      'NotFound',
      coordinate,
      `not published (tried ${names.join(', ')})`,
    );
  }

  /**
   * Metadata URL for one artifact name.
   */
  metadataUrl(group: string, artifactName: string): string {
    return `${this.baseUrl}/${group.replaceAll('.', '/')}/${artifactName}/maven-metadata.xml`;
  }

  /**
   * Fetch the metadata document, or undefined when the artifact is missing.
   */
  protected async fetchMetadata(
    coordinate: Coordinate,
    artifactName: string,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const url = this.metadataUrl(coordinate.group, artifactName);
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    if (signal?.aborted) throw new ResolutionCancelledError();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetcher(url, {
        headers: { Accept: 'application/xml' },
        signal: controller.signal,
      });

      if (MISSING_STATUSES.has(response.status)) return undefined;

      if (response.status === 429 || response.status >= 500) {
        throw new RegistryError(
          'Network',
          coordinate,
          `${url} responded ${response.status}`,
        );
      }

      if (!response.ok) {
        throw new RegistryError(
          'Malformed',
          coordinate,
          `${url} responded ${response.status}`,
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof RegistryError) throw error;
      if (signal?.aborted) throw new ResolutionCancelledError();

      const detail = controller.signal.aborted
        ? `request timed out after ${this.timeoutMs}ms`
        : error instanceof Error
        ? error.message
        : String(error);

      throw new RegistryError('Network', coordinate, detail, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  protected parseMetadata(coordinate: Coordinate, body: string): string[] {
    let document: unknown;

    try {
      document = this.parser.parse(body, true);
    } catch (error) {
      throw new RegistryError(
        'Malformed',
        coordinate,
        `invalid maven-metadata.xml: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const parsed = MetadataSchema.safeParse(document);
    if (!parsed.success) {
      throw new RegistryError(
        'Malformed',
        coordinate,
        'maven-metadata.xml has no <versions> list',
      );
    }

    return parsed.data.metadata.versioning.versions.version.map((v) => v.trim());
  }
}

import { expect, test } from 'vitest';
import { createCoordinate } from '../../src/deps/Coordinate.ts';
import { MavenCentralClient } from '../../src/deps/MavenCentralClient.ts';
import { RegistryError, ResolutionCancelledError } from '../../src/deps/RegistryClient.ts';
import { library } from '../_mocks.ts';

const BASE = 'https://repo.test/maven2';

function metadata(...versions: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<metadata>
  <groupId>dev.zio</groupId>
  <artifactId>zio</artifactId>
  <versioning>
    <latest>${versions.at(-1) ?? ''}</latest>
    <versions>
${versions.map((v) => `      <version>${v}</version>`).join('\n')}
    </versions>
    <lastUpdated>20240101000000</lastUpdated>
  </versioning>
</metadata>`;
}

type Route = string | number | Error;

/**
 * Fake fetch answering from a route table; unknown URLs are 404.
 */
function fakeFetch(routes: Record<string, Route>, requested: string[] = []): typeof fetch {
  return (input) => {
    const url = input instanceof Request ? input.url : String(input);
    requested.push(url);

    const route = routes[url] ?? 404;
    if (route instanceof Error) return Promise.reject(route);
    if (typeof route === 'number') return Promise.resolve(new Response('', { status: route }));
    return Promise.resolve(new Response(route, { status: 200 }));
  };
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the lookup to fail');
}

// =============================================================================
// MavenCentralClient.metadataUrl() Tests
// =============================================================================

test('MavenCentralClient.metadataUrl - Maps the group to a path', () => {
  const client = new MavenCentralClient({ baseUrl: `${BASE}/` });

  expect(client.metadataUrl('org.typelevel', 'cats-core_2.13')).toBe(
    `${BASE}/org/typelevel/cats-core_2.13/maven-metadata.xml`,
  );
});

// =============================================================================
// MavenCentralClient.fetchVersions() Tests
// =============================================================================

test('MavenCentralClient.fetchVersions - Reads versions for a plain artifact', async () => {
  const requested: string[] = [];
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({
      [`${BASE}/org/postgresql/postgresql/maven-metadata.xml`]: metadata('42.5.1', '42.7.3'),
    }, requested),
  });

  const versions = await client.fetchVersions(library('org.postgresql', 'postgresql', '%'));

  expect(versions).toEqual(['42.5.1', '42.7.3']);
  expect(requested).toHaveLength(1);
});

test('MavenCentralClient.fetchVersions - Reads a single version as a list', async () => {
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({ [`${BASE}/g/a/maven-metadata.xml`]: metadata('1.0') }),
  });

  expect(await client.fetchVersions(library('g', 'a', '%'))).toEqual(['1.0']);
});

test('MavenCentralClient.fetchVersions - Tries cross-version suffixes in order', async () => {
  const requested: string[] = [];
  const client = new MavenCentralClient({
    baseUrl: BASE,
    scalaVersion: '2.13.12',
    fetch: fakeFetch({
      [`${BASE}/dev/zio/zio_2.12/maven-metadata.xml`]: metadata('1.0.18'),
    }, requested),
  });

  const versions = await client.fetchVersions(library('dev.zio', 'zio'));

  expect(versions).toEqual(['1.0.18']);
  expect(requested).toEqual([
    `${BASE}/dev/zio/zio_2.13/maven-metadata.xml`,
    `${BASE}/dev/zio/zio_2.12/maven-metadata.xml`,
  ]);
});

test('MavenCentralClient.fetchVersions - Looks up sbt plugins by their published name', async () => {
  const requested: string[] = [];
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({
      [`${BASE}/org/scalameta/sbt-scalafmt_2.12_1.0/maven-metadata.xml`]: metadata('2.5.2'),
    }, requested),
  });
  const plugin = createCoordinate({
    group: 'org.scalameta',
    artifact: 'sbt-scalafmt',
    separator: '%',
    target: 'plugin',
  });

  expect(await client.fetchVersions(plugin)).toEqual(['2.5.2']);
  expect(requested).toHaveLength(1);
});

test('MavenCentralClient.fetchVersions - NotFound when no name is published', async () => {
  const requested: string[] = [];
  const client = new MavenCentralClient({
    baseUrl: BASE,
    scalaVersion: '2.12.18',
    fetch: fakeFetch({ [`${BASE}/g/a_2.12/maven-metadata.xml`]: 410 }, requested),
  });

  const error = await failureOf(client.fetchVersions(library('g', 'a')));

  expect(error).toBeInstanceOf(RegistryError);
  expect(error).toMatchObject({ kind: 'NotFound' });
  expect(requested).toEqual([
    `${BASE}/g/a_2.12/maven-metadata.xml`,
    `${BASE}/g/a/maven-metadata.xml`,
  ]);
});

test('MavenCentralClient.fetchVersions - Server errors and throttling are Network failures', async () => {
  const url = `${BASE}/g/a/maven-metadata.xml`;

  for (const status of [429, 500, 503]) {
    const client = new MavenCentralClient({ baseUrl: BASE, fetch: fakeFetch({ [url]: status }) });
    const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

    expect(error).toMatchObject({ kind: 'Network' });
  }
});

test('MavenCentralClient.fetchVersions - Other HTTP failures are Malformed', async () => {
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({ [`${BASE}/g/a/maven-metadata.xml`]: 403 }),
  });

  const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

  expect(error).toMatchObject({ kind: 'Malformed' });
});

test('MavenCentralClient.fetchVersions - Transport errors are Network failures', async () => {
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({ [`${BASE}/g/a/maven-metadata.xml`]: new TypeError('fetch failed') }),
  });

  const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

  expect(error).toMatchObject({ kind: 'Network', message: 'g % a: fetch failed' });
});

test('MavenCentralClient.fetchVersions - Invalid XML is Malformed', async () => {
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({ [`${BASE}/g/a/maven-metadata.xml`]: '<metadata><versioning>' }),
  });

  const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

  expect(error).toMatchObject({ kind: 'Malformed' });
});

test('MavenCentralClient.fetchVersions - Metadata without versions is Malformed', async () => {
  const client = new MavenCentralClient({
    baseUrl: BASE,
    fetch: fakeFetch({
      [`${BASE}/g/a/maven-metadata.xml`]: '<metadata><groupId>g</groupId></metadata>',
    }),
  });

  const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

  expect(error).toMatchObject({
    kind: 'Malformed',
    message: 'g % a: maven-metadata.xml has no <versions> list',
  });
});

test('MavenCentralClient.fetchVersions - Requests time out as Network failures', async () => {
  const hanging: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  const client = new MavenCentralClient({ baseUrl: BASE, timeoutMs: 5, fetch: hanging });

  const error = await failureOf(client.fetchVersions(library('g', 'a', '%')));

  expect(error).toMatchObject({
    kind: 'Network',
    message: 'g % a: request timed out after 5ms',
  });
});

test('MavenCentralClient.fetchVersions - Caller abort cancels the lookup', async () => {
  const controller = new AbortController();
  const hanging: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  const client = new MavenCentralClient({ baseUrl: BASE, timeoutMs: 10000, fetch: hanging });

  const pending = failureOf(client.fetchVersions(library('g', 'a', '%'), controller.signal));
  controller.abort();

  expect(await pending).toBeInstanceOf(ResolutionCancelledError);
});

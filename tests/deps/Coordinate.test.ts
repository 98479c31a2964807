import { expect, test } from 'vitest';
import {
  artifactNames,
  coordinateKey,
  createCoordinate,
  formatCoordinate,
  scalaSuffixes,
} from '../../src/deps/Coordinate.ts';
import { library } from '../_mocks.ts';

// =============================================================================
// Coordinate identity Tests
// =============================================================================

test('createCoordinate - Returns a frozen copy', () => {
  const fields = { group: 'g', artifact: 'a', separator: '%', target: 'library' } as const;
  const coordinate = createCoordinate(fields);

  expect(coordinate).not.toBe(fields);
  expect(Object.isFrozen(coordinate)).toBe(true);
});

test('coordinateKey - Every field takes part in identity', () => {
  const zio = library('dev.zio', 'zio');

  expect(coordinateKey(zio)).toBe(coordinateKey(library('dev.zio', 'zio')));
  expect(coordinateKey(zio)).not.toBe(coordinateKey(library('dev.zio', 'zio', '%')));
  expect(coordinateKey(zio)).not.toBe(coordinateKey(library('dev.zio', 'zio', '%%', 'Test')));
  expect(coordinateKey(zio)).not.toBe(
    coordinateKey(createCoordinate({ ...zio, target: 'plugin' })),
  );
});

test('formatCoordinate - Shows the separator and scope', () => {
  expect(formatCoordinate(library('dev.zio', 'zio'))).toBe('dev.zio %% zio');
  expect(formatCoordinate(library('dev.zio', 'zio-test', '%%', 'Test'))).toBe(
    'dev.zio %% zio-test (Test)',
  );
});

// =============================================================================
// scalaSuffixes() / artifactNames() Tests
// =============================================================================

test('scalaSuffixes - Orders suffixes by the declared Scala version', () => {
  expect(scalaSuffixes('2.12.18')).toEqual(['_2.12', '']);
  expect(scalaSuffixes('2.13.12')).toEqual(['_2.13', '_2.12', '']);
  expect(scalaSuffixes('3.4.2')).toEqual(['_3', '_2.13', '_2.12', '']);
  expect(scalaSuffixes()).toEqual(['_2.13', '_3', '_2.12', '']);
  expect(scalaSuffixes('2.11.12')).toEqual(['_2.13', '_3', '_2.12', '']);
});

test('artifactNames - Plain artifacts use their literal name', () => {
  expect(artifactNames(library('org.postgresql', 'postgresql', '%'), '3.4.2')).toEqual([
    'postgresql',
  ]);
});

test('artifactNames - Scala artifacts try each suffix', () => {
  expect(artifactNames(library('dev.zio', 'zio'), '3.4.2')).toEqual([
    'zio_3',
    'zio_2.13',
    'zio_2.12',
    'zio',
  ]);
});

test('artifactNames - Scala.js artifacts try platform names first', () => {
  expect(artifactNames(library('com.lihaoyi', 'upickle', '%%%'), '2.12.18')).toEqual([
    'upickle_sjs1_2.12',
    'upickle_2.12',
    'upickle',
  ]);
});

test('artifactNames - Plugins use the sbt 1.x published name', () => {
  const plugin = createCoordinate({
    group: 'org.scalameta',
    artifact: 'sbt-scalafmt',
    separator: '%',
    target: 'plugin',
  });

  expect(artifactNames(plugin)).toEqual(['sbt-scalafmt_2.12_1.0', 'sbt-scalafmt']);
});

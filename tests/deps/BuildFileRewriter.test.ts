import { expect, test } from 'vitest';
import { BuildFileParser } from '../../src/deps/BuildFileParser.ts';
import { BuildFileRewriter, RewriteError } from '../../src/deps/BuildFileRewriter.ts';
import type { Coordinate } from '../../src/deps/Coordinate.ts';
import type { UpdateCandidate } from '../../src/deps/UpdateClassifier.ts';
import { library } from '../_mocks.ts';

const parser = new BuildFileParser();
const rewriter = new BuildFileRewriter();

function upgrade(coordinate: Coordinate, current: string, proposed: string): UpdateCandidate {
  return {
    coordinate,
    current,
    proposed,
    rank: 'Minor',
    alternatives: [{ version: proposed, rank: 'Minor' }],
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a RewriteError');
}

const BUILD = `libraryDependencies ++= Seq(
  "dev.zio" %% "zio" % "2.0.0", // core
  "org.postgresql" % "postgresql" % "42.5.1"
)
`;

const SHARED = `val zioVersion = "2.0.0"
libraryDependencies ++= Seq(
  "dev.zio" %% "zio" % zioVersion,
  "dev.zio" %% "zio-streams" % zioVersion
)
`;

// =============================================================================
// BuildFileRewriter.rewrite() Tests
// =============================================================================

test('BuildFileRewriter.rewrite - Replaces only the selected version text', () => {
  const updated = rewriter.rewrite(BUILD, parser.parse(BUILD), [
    upgrade(library('dev.zio', 'zio'), '2.0.0', '2.1.0'),
  ]);

  expect(updated).toBe(`libraryDependencies ++= Seq(
  "dev.zio" %% "zio" % "2.1.0", // core
  "org.postgresql" % "postgresql" % "42.5.1"
)
`);
});

test('BuildFileRewriter.rewrite - Empty selection returns the text unchanged', () => {
  expect(rewriter.rewrite(BUILD, parser.parse(BUILD), [])).toBe(BUILD);
});

test('BuildFileRewriter.rewrite - Applies several upgrades of different lengths', () => {
  const updated = rewriter.rewrite(BUILD, parser.parse(BUILD), [
    upgrade(library('org.postgresql', 'postgresql', '%'), '42.5.1', '42.7.10'),
    upgrade(library('dev.zio', 'zio'), '2.0.0', '2.1.0-RC1'),
  ]);

  expect(updated).toBe(`libraryDependencies ++= Seq(
  "dev.zio" %% "zio" % "2.1.0-RC1", // core
  "org.postgresql" % "postgresql" % "42.7.10"
)
`);
});

test('BuildFileRewriter.rewrite - Edits a shared variable once', () => {
  const updated = rewriter.rewrite(SHARED, parser.parse(SHARED), [
    upgrade(library('dev.zio', 'zio'), '2.0.0', '2.1.0'),
    upgrade(library('dev.zio', 'zio-streams'), '2.0.0', '2.1.0'),
  ]);

  expect(updated).toBe(SHARED.replace('"2.0.0"', '"2.1.0"'));
});

test('BuildFileRewriter.rewrite - Upgrading a version variable leaves references alone', () => {
  const content = `val libVersion = "1.0"
libraryDependencies += "org.example" % "lib" % libVersion
`;

  const updated = rewriter.rewrite(content, parser.parse(content), [
    upgrade(library('org.example', 'lib', '%'), '1.0', '1.1'),
  ]);

  expect(updated).toBe(`val libVersion = "1.1"
libraryDependencies += "org.example" % "lib" % libVersion
`);
});

test('BuildFileRewriter.rewrite - Keeps offsets after non-ASCII text', () => {
  const content = `// résumé 🚀\nlibraryDependencies += "g" % "a" % "1.0.0"\n`;

  const updated = rewriter.rewrite(content, parser.parse(content), [
    upgrade(library('g', 'a', '%'), '1.0.0', '1.1.0'),
  ]);

  expect(updated).toBe(`// résumé 🚀\nlibraryDependencies += "g" % "a" % "1.1.0"\n`);
});

// =============================================================================
// BuildFileRewriter.plan() Tests
// =============================================================================

test('BuildFileRewriter.plan - Sorts edits by start offset', () => {
  const plan = rewriter.plan(parser.parse(BUILD), [
    upgrade(library('org.postgresql', 'postgresql', '%'), '42.5.1', '42.7.3'),
    upgrade(library('dev.zio', 'zio'), '2.0.0', '2.1.0'),
  ]);

  expect(plan.map((e) => e.text)).toEqual(['2.1.0', '42.7.3']);
  expect(Object.isFrozen(plan)).toBe(true);
});

test('BuildFileRewriter.plan - Skips declarations already at the proposed version', () => {
  const plan = rewriter.plan(parser.parse(BUILD), [
    upgrade(library('dev.zio', 'zio'), '2.0.0', '2.0.0'),
  ]);

  expect(plan).toEqual([]);
});

test('BuildFileRewriter.plan - Never downgrades a newer declaration', () => {
  const content = `libraryDependencies += "org.example" % "lib" % "1.0"
libraryDependencies += "org.example" % "lib" % "3.0.0-M1"
`;

  const updated = rewriter.rewrite(content, parser.parse(content), [
    upgrade(library('org.example', 'lib', '%'), '1.0', '2.0'),
  ]);

  expect(updated).toBe(`libraryDependencies += "org.example" % "lib" % "2.0"
libraryDependencies += "org.example" % "lib" % "3.0.0-M1"
`);
});

test('BuildFileRewriter.plan - Scope is part of the identity', () => {
  const plan = rewriter.plan(parser.parse(BUILD), [
    upgrade(library('dev.zio', 'zio', '%%', 'Test'), '2.0.0', '2.1.0'),
  ]);

  expect(plan).toEqual([]);
});

test('BuildFileRewriter.plan - Different versions for a shared variable conflict', () => {
  const start = SHARED.indexOf('"2.0.0"') + 1;

  const error = thrown(() =>
    rewriter.plan(parser.parse(SHARED), [
      upgrade(library('dev.zio', 'zio'), '2.0.0', '2.1.0'),
      upgrade(library('dev.zio', 'zio-streams'), '2.0.0', '2.0.5'),
    ])
  );

  expect(error).toBeInstanceOf(RewriteError);
  expect(error).toMatchObject({
    kind: 'SpanConflict',
    span: { start, end: start + 5 },
    message: `Conflicting edits for span [${start}, ${start + 5}): "2.1.0" and "2.0.5" (shared by zioVersion)`,
  });
});

// =============================================================================
// BuildFileRewriter.apply() Tests
// =============================================================================

test('BuildFileRewriter.apply - Adjacent edits are allowed', () => {
  const updated = rewriter.apply('abcdef', [
    { span: { start: 3, end: 6 }, text: 'Z' },
    { span: { start: 0, end: 3 }, text: 'X' },
  ]);

  expect(updated).toBe('XZ');
});

test('BuildFileRewriter.apply - Rejects spans outside the text', () => {
  const error = thrown(() => rewriter.apply('abc', [{ span: { start: 2, end: 5 }, text: 'x' }]));

  expect(error).toMatchObject({
    kind: 'OutOfRange',
    message: 'span [2, 5) is outside the text (length 3)',
  });
});

test('BuildFileRewriter.apply - Rejects inverted spans', () => {
  const error = thrown(() => rewriter.apply('abc', [{ span: { start: 2, end: 1 }, text: 'x' }]));

  expect(error).toMatchObject({ kind: 'OutOfRange' });
});

test('BuildFileRewriter.apply - Rejects overlapping spans', () => {
  const error = thrown(() =>
    rewriter.apply('abcdef', [
      { span: { start: 0, end: 3 }, text: 'x' },
      { span: { start: 2, end: 4 }, text: 'y' },
    ])
  );

  expect(error).toMatchObject({
    kind: 'SpanConflict',
    message: 'span [2, 4) overlaps span [0, 3)',
  });
});

test('BuildFileRewriter.apply - Two insertions at one offset conflict', () => {
  const error = thrown(() =>
    rewriter.apply('abc', [
      { span: { start: 1, end: 1 }, text: 'x' },
      { span: { start: 1, end: 1 }, text: 'y' },
    ])
  );

  expect(error).toMatchObject({ kind: 'SpanConflict' });
});

import { expect, test } from 'vitest';
import { ParseError, positionAt, ScalaLexer } from '../../src/deps/ScalaLexer.ts';

const lexer = new ScalaLexer();

function parseErrorOf(text: string): ParseError {
  try {
    lexer.tokenize(text);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

// =============================================================================
// ScalaLexer.tokenize() Tests
// =============================================================================

test('ScalaLexer.tokenize - Tokenizes a dependency expression', () => {
  const tokens = lexer.tokenize('"dev.zio" %% "zio" % "2.0.0"');

  expect(tokens.map((t) => t.kind)).toEqual(['string', 'op', 'string', 'op', 'string']);
  expect(tokens.map((t) => t.text)).toEqual(['"dev.zio"', '%%', '"zio"', '%', '"2.0.0"']);
});

test('ScalaLexer.tokenize - String value span excludes the quotes', () => {
  const [token] = lexer.tokenize('  "2.0.0"');

  expect(token.start).toBe(2);
  expect(token.end).toBe(9);
  expect(token.value).toBe('2.0.0');
  expect(token.valueSpan).toEqual({ start: 3, end: 8 });
});

test('ScalaLexer.tokenize - Drops line and nested block comments', () => {
  const tokens = lexer.tokenize('a // "x" % "y"\n/* outer /* inner */ still */ b');

  expect(tokens.map((t) => t.text)).toEqual(['a', 'b']);
});

test('ScalaLexer.tokenize - Marks interpolated strings', () => {
  const [token] = lexer.tokenize('s"zio-${suffix}"');

  expect(token.kind).toBe('string');
  expect(token.interpolated).toBe(true);
  expect(token.text).toBe('s"zio-${suffix}"');
});

test('ScalaLexer.tokenize - Reads triple-quoted strings', () => {
  const [token, next] = lexer.tokenize('"""a "quoted" value""" x');

  expect(token.value).toBe('a "quoted" value');
  expect(next.text).toBe('x');
});

test('ScalaLexer.tokenize - Keeps escaped quotes inside strings', () => {
  const tokens = lexer.tokenize('"say \\"hi\\"" x');

  expect(tokens.length).toBe(2);
  expect(tokens[0].value).toBe('say \\"hi\\"');
});

test('ScalaLexer.tokenize - Splits operators before a comment', () => {
  const tokens = lexer.tokenize('a :=// comment\nb');

  expect(tokens.map((t) => t.text)).toEqual(['a', ':=', 'b']);
});

test('ScalaLexer.tokenize - Reads char literals and backtick identifiers', () => {
  const tokens = lexer.tokenize("`my-key` := 'x'");

  expect(tokens.map((t) => t.kind)).toEqual(['ident', 'op', 'char']);
});

test('ScalaLexer.tokenize - Reads numbers as single tokens', () => {
  const tokens = lexer.tokenize('val n = 1.5e3');

  expect(tokens[3]).toMatchObject({ kind: 'number', text: '1.5e3' });
});

// =============================================================================
// ScalaLexer.tokenize() Errors
// =============================================================================

test('ScalaLexer.tokenize - Unterminated string fails with its position', () => {
  const error = parseErrorOf('val a = "1.0\nval b = 2');

  expect(error.reason).toBe('Unterminated string literal');
  expect(error.offset).toBe(8);
  expect(error.line).toBe(1);
  expect(error.column).toBe(9);
});

test('ScalaLexer.tokenize - Unterminated block comment fails', () => {
  expect(parseErrorOf('a /* never closed').reason).toBe('Unterminated block comment');
});

test('ScalaLexer.tokenize - Unterminated triple-quoted string fails', () => {
  expect(parseErrorOf('"""open').reason).toBe('Unterminated multi-line string');
});

test('ScalaLexer.tokenize - Mismatched bracket fails', () => {
  const error = parseErrorOf('Seq(\n  "a"\n]');

  expect(error.reason).toBe("Expected ')' but found ']'");
  expect(error.line).toBe(3);
  expect(error.column).toBe(1);
});

test('ScalaLexer.tokenize - Unclosed bracket points at the opener', () => {
  const error = parseErrorOf('x ++= Seq(');

  expect(error.reason).toBe("Unclosed '('");
  expect(error.offset).toBe(9);
});

test('ScalaLexer.tokenize - Unexpected closing bracket fails', () => {
  expect(parseErrorOf('a)').reason).toBe("Unexpected ')'");
});

test('ScalaLexer.tokenize - Message includes line and column', () => {
  expect(parseErrorOf('\n\n  )').message).toBe("Unexpected ')' at line 3, column 3");
});

// =============================================================================
// positionAt() Tests
// =============================================================================

test('positionAt - Counts lines and columns from 1', () => {
  const text = 'ab\ncd\nef';

  expect(positionAt(text, 0)).toEqual({ line: 1, column: 1 });
  expect(positionAt(text, 4)).toEqual({ line: 2, column: 2 });
  expect(positionAt(text, 6)).toEqual({ line: 3, column: 1 });
});

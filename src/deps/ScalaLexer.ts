/**
 * Minimal Scala tokenizer for sbt build definitions.
 *
 * The lexer does not build a syntax tree. It produces a flat token stream
 * with exact source offsets, drops comments, and rejects text that cannot
 * be a valid build definition at the lexical level: unterminated strings
 * or comments, unbalanced brackets and stray characters.
 *
 * @module
 */

import type { Span } from './Coordinate.ts';

/** Token categories produced by {@link ScalaLexer}. */
export type TokenKind = 'string' | 'ident' | 'op' | 'punct' | 'number' | 'char';

/**
 * A lexical token with its position in the source.
 */
export interface Token {
  kind: TokenKind;

  /** Raw source text of the token */
  text: string;

  /** Offset of the first character */
  start: number;

  /** Offset after the last character */
  end: number;

  /** String contents without quotes (strings only) */
  value?: string;

  /** Span of the string contents (strings only) */
  valueSpan?: Span;

  /** Whether the string has an interpolator prefix such as `s"..."` */
  interpolated?: boolean;
}

/**
 * 1-indexed line and column of an offset.
 */
export interface SourcePosition {
  line: number;
  column: number;
}

/**
 * Raised when build text is not lexically valid Scala.
 */
export class ParseError extends Error {
  override readonly name = 'ParseError';
  readonly reason: string;
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  constructor(reason: string, offset: number, text: string) {
    const position = positionAt(text, offset);
    super(`${reason} at line ${position.line}, column ${position.column}`);
    this.reason = reason;
    this.offset = offset;
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * Convert an offset to a 1-indexed line/column pair.
 */
export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;

  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }

  return { line, column: offset - lineStart + 1 };
}

const OPERATOR_CHARS = new Set('!#%&*+-/:<=>?@\\^|~');
const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);
const SEPARATORS = new Set([',', ';', '.']);

const IDENT_START = /[\p{L}_$]/u;
const IDENT_REST = /[\p{L}\p{N}_$]/u;
const UNICODE_OPERATOR = /[\p{Sm}\p{So}]/u;
const NUMBER = /0[xX][0-9a-fA-F_]+[lL]?|[0-9][0-9_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9]+)?[lLfFdD]?/y;

/**
 * Tokenizer for sbt/Scala source text.
 *
 * @example
 * ```typescript
 * const tokens = new ScalaLexer().tokenize('"dev.zio" %% "zio" % "2.0.0"');
 * tokens.map((t) => t.kind); // ['string', 'op', 'string', 'op', 'string']
 * ```
 */
export class ScalaLexer {
  /**
   * Tokenize source text.
   *
   * @throws ParseError when the text is not lexically valid
   */
  tokenize(text: string): Token[] {
    const tokens: Token[] = [];
    const brackets: { char: string; offset: number }[] = [];
    let i = 0;

    while (i < text.length) {
      const ch = text[i];
      const next = text[i + 1];

      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\uFEFF') {
        i++;
        continue;
      }

      if (ch === '/' && next === '/') {
        const eol = text.indexOf('\n', i);
        i = eol === -1 ? text.length : eol;
        continue;
      }

      if (ch === '/' && next === '*') {
        i = this.skipBlockComment(text, i);
        continue;
      }

      if (ch === '"') {
        const token = this.readString(text, i, i, false);
        tokens.push(token);
        i = token.end;
        continue;
      }

      if (ch === '`') {
        const close = text.indexOf('`', i + 1);
        if (close === -1 || text.slice(i, close).includes('\n')) {
          throw new ParseError('Unterminated quoted identifier', i, text);
        }
        tokens.push({ kind: 'ident', text: text.slice(i, close + 1), start: i, end: close + 1 });
        i = close + 1;
        continue;
      }

      if (ch === "'") {
        const token = this.readQuote(text, i);
        tokens.push(token);
        i = token.end;
        continue;
      }

      if (IDENT_START.test(ch)) {
        let end = i + 1;
        while (end < text.length && IDENT_REST.test(text[end])) end++;

        if (text[end] === '"') {
          const token = this.readString(text, i, end, true);
          tokens.push(token);
          i = token.end;
          continue;
        }

        tokens.push({ kind: 'ident', text: text.slice(i, end), start: i, end });
        i = end;
        continue;
      }

      if (ch >= '0' && ch <= '9') {
        NUMBER.lastIndex = i;
        const match = NUMBER.exec(text);
        const end = match ? i + match[0].length : i + 1;
        tokens.push({ kind: 'number', text: text.slice(i, end), start: i, end });
        i = end;
        continue;
      }

      if (ch in OPENERS) {
        brackets.push({ char: ch, offset: i });
        tokens.push({ kind: 'punct', text: ch, start: i, end: i + 1 });
        i++;
        continue;
      }

      if (CLOSERS.has(ch)) {
        const open = brackets.pop();
        if (!open) {
          throw new ParseError(`Unexpected '${ch}'`, i, text);
        }
        if (OPENERS[open.char] !== ch) {
          throw new ParseError(
            `Expected '${OPENERS[open.char]}' but found '${ch}'`,
            i,
            text,
          );
        }
        tokens.push({ kind: 'punct', text: ch, start: i, end: i + 1 });
        i++;
        continue;
      }

      if (SEPARATORS.has(ch)) {
        tokens.push({ kind: 'punct', text: ch, start: i, end: i + 1 });
        i++;
        continue;
      }

      if (OPERATOR_CHARS.has(ch) || UNICODE_OPERATOR.test(ch)) {
        let end = i + 1;
        while (
          end < text.length &&
          (OPERATOR_CHARS.has(text[end]) || UNICODE_OPERATOR.test(text[end])) &&
          !(text[end] === '/' && (text[end + 1] === '/' || text[end + 1] === '*'))
        ) {
          end++;
        }
        tokens.push({ kind: 'op', text: text.slice(i, end), start: i, end });
        i = end;
        continue;
      }

      throw new ParseError(`Unexpected character '${ch}'`, i, text);
    }

    const unclosed = brackets.pop();
    if (unclosed) {
      throw new ParseError(`Unclosed '${unclosed.char}'`, unclosed.offset, text);
    }

    return tokens;
  }

  /**
   * Skip a (possibly nested) block comment, returning the offset after it.
   */
  protected skipBlockComment(text: string, start: number): number {
    let depth = 0;
    let i = start;

    while (i < text.length) {
      if (text[i] === '/' && text[i + 1] === '*') {
        depth++;
        i += 2;
      } else if (text[i] === '*' && text[i + 1] === '/') {
        depth--;
        i += 2;
        if (depth === 0) return i;
      } else {
        i++;
      }
    }

    throw new ParseError('Unterminated block comment', start, text);
  }

  /**
   * Read a string literal whose opening quote is at `quote`. `start` is
   * where the token begins (before any interpolator prefix).
   */
  protected readString(
    text: string,
    start: number,
    quote: number,
    interpolated: boolean,
  ): Token {
    if (text.startsWith('"""', quote)) {
      let close = text.indexOf('"""', quote + 3);
      if (close === -1) {
        throw new ParseError('Unterminated multi-line string', start, text);
      }
      // Closing delimiter is the last three of a run of quotes.
      while (text[close + 3] === '"') close++;

      return this.stringToken(text, start, quote + 3, close, close + 3, interpolated);
    }

    let i = quote + 1;

    while (i < text.length) {
      const ch = text[i];

      if (ch === '\\') {
        i += 2;
        continue;
      }

      if (interpolated && ch === '$' && text[i + 1] === '{') {
        i = this.skipInterpolation(text, i + 1);
        continue;
      }

      if (ch === '\n') break;

      if (ch === '"') {
        return this.stringToken(text, start, quote + 1, i, i + 1, interpolated);
      }

      i++;
    }

    throw new ParseError('Unterminated string literal', start, text);
  }

  protected stringToken(
    text: string,
    start: number,
    valueStart: number,
    valueEnd: number,
    end: number,
    interpolated: boolean,
  ): Token {
    return {
      kind: 'string',
      text: text.slice(start, end),
      start,
      end,
      value: text.slice(valueStart, valueEnd),
      valueSpan: { start: valueStart, end: valueEnd },
      interpolated,
    };
  }

  /**
   * Skip a `${ ... }` block inside an interpolated string.
   */
  protected skipInterpolation(text: string, brace: number): number {
    let depth = 0;

    for (let i = brace; i < text.length; i++) {
      if (text[i] === '{') depth++;
      if (text[i] === '}') {
        depth--;
        if (depth === 0) return i + 1;
      }
    }

    throw new ParseError('Unterminated string interpolation', brace, text);
  }

  /**
   * Read a character literal (`'a'`, `'\n'`) or an old-style symbol (`'sym`).
   */
  protected readQuote(text: string, start: number): Token {
    if (text[start + 1] === '\\') {
      const close = text.indexOf("'", start + 2);
      if (close === -1 || close - start > 8) {
        throw new ParseError('Unterminated character literal', start, text);
      }
      return { kind: 'char', text: text.slice(start, close + 1), start, end: close + 1 };
    }

    if (text[start + 2] === "'" && text[start + 1] !== '\n') {
      return { kind: 'char', text: text.slice(start, start + 3), start, end: start + 3 };
    }

    let end = start + 1;
    while (end < text.length && IDENT_REST.test(text[end])) end++;

    if (end === start + 1) {
      throw new ParseError('Unterminated character literal', start, text);
    }

    return { kind: 'ident', text: text.slice(start, end), start, end };
  }
}

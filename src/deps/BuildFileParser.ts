/**
 * Parser for dependency declarations in sbt build definitions.
 *
 * This module extracts dependency coordinates from `build.sbt`,
 * `project/plugins.sbt` and `project/*.scala` text, keeping the exact span
 * of every version literal so it can be rewritten without touching
 * anything else in the file.
 *
 * ## Supported Declarations
 *
 * ### Dependencies
 * - `"group" % "artifact" % "1.0.0"`
 * - `"group" %% "artifact" % "1.0.0" % Test`
 * - `"group" %%% "artifact" % catsVersion` (version from a `val`)
 * - `"group" %% "artifact" % Versions.cats` (qualified `val`)
 *
 * ### Plugins
 * - `addSbtPlugin("group" % "artifact" % "1.0.0")`
 *
 * ### Scala version
 * - `scalaVersion := "2.13.12"` (reported as `org.scala-lang % scala-library`)
 *
 * @module
 */

import {
  type Coordinate,
  coordinateKey,
  createCoordinate,
  type CrossSeparator,
  type Span,
} from './Coordinate.ts';
import { positionAt, ScalaLexer, type Token } from './ScalaLexer.ts';

/**
 * One occurrence of a coordinate in build text.
 */
export interface Declaration {
  coordinate: Coordinate;

  /** Declared version (e.g., '2.0.0') */
  version: string;

  /** Whether the version is written inline or comes from a `val` */
  source: 'literal' | 'variable';

  /** Referenced variable name, when `source` is 'variable' */
  variable?: string;

  /** Span of the version text, or of the variable definition's literal */
  span: Span;

  /** Offset where the declaration occurs */
  offset: number;

  /** Line number (1-indexed) of the occurrence */
  line: number;

  /** Column (1-indexed) of the occurrence */
  column: number;
}

/**
 * A `val name = "literal"` definition.
 */
export interface VersionVariable {
  name: string;
  value: string;
  span: Span;
}

const DEFINITION_KEYWORDS = new Set(['val']);
const SCALA_GROUP = 'org.scala-lang';

/**
 * Parser for extracting dependency declarations from sbt build text.
 *
 * @example Parse a build file
 * ```typescript
 * const parser = new BuildFileParser();
 * const declarations = parser.parse(await readFile('build.sbt', 'utf8'));
 *
 * for (const decl of declarations) {
 *   console.log(`${decl.coordinate.artifact} ${decl.version}`);
 * }
 * ```
 */
export class BuildFileParser {
  protected lexer = new ScalaLexer();

  /**
   * Parse build text and extract all dependency declarations in file order.
   *
   * @throws ParseError when the text is not valid Scala at the lexical level
   */
  parse(content: string): Declaration[] {
    const tokens = this.lexer.tokenize(content);
    const variables = this.collectVariables(tokens);
    const declarations: Declaration[] = [];

    let i = 0;
    while (i < tokens.length) {
      const dependency = this.matchDependency(content, tokens, i, variables);
      if (dependency) {
        declarations.push(dependency.declaration);
        i = dependency.next;
        continue;
      }

      const scala = this.matchScalaVersion(content, tokens, i, variables);
      if (scala) {
        declarations.push(scala.declaration);
        i = scala.next;
        continue;
      }

      i++;
    }

    return declarations;
  }

  /**
   * Collect `val name = "literal"` definitions, keyed by name.
   *
   * Only definitions whose entire right-hand side is one plain string
   * literal are version variables. A name defined more than once resolves
   * to its last definition.
   */
  collectVariables(tokens: Token[]): Map<string, VersionVariable> {
    const variables = new Map<string, VersionVariable>();

    for (let i = 0; i < tokens.length; i++) {
      if (tokens[i].kind !== 'ident' || !DEFINITION_KEYWORDS.has(tokens[i].text)) {
        continue;
      }

      const name = tokens[i + 1];
      if (name?.kind !== 'ident') continue;

      let cursor = i + 2;

      // Skip a type annotation: `val v: String = ...`
      if (tokens[cursor]?.kind === 'op' && tokens[cursor].text === ':') {
        while (
          cursor < tokens.length &&
          !(tokens[cursor].kind === 'op' && tokens[cursor].text === '=')
        ) {
          cursor++;
        }
      }

      const equals = tokens[cursor];
      const literal = tokens[cursor + 1];
      if (equals?.kind !== 'op' || equals.text !== '=') continue;
      if (!this.isPlainString(literal) || !literal.valueSpan || literal.value === undefined) {
        continue;
      }
      if (this.continuesExpression(tokens[cursor + 2], literal)) continue;

      variables.set(name.text, {
        name: name.text,
        value: literal.value,
        span: literal.valueSpan,
      });
    }

    return variables;
  }

  /**
   * Get the first declaration of each distinct coordinate, in file order.
   */
  uniqueCoordinates(declarations: Declaration[]): Coordinate[] {
    const seen = new Map<string, Coordinate>();

    for (const decl of declarations) {
      const key = coordinateKey(decl.coordinate);
      if (!seen.has(key)) {
        seen.set(key, decl.coordinate);
      }
    }

    return [...seen.values()];
  }

  /**
   * Filter declarations by coordinate pattern.
   *
   * Patterns containing `:` match `group:artifact`, others match the
   * artifact alone. `*` is a wildcard:
   * - `dev.zio:*` matches every artifact in the `dev.zio` group
   * - `zio-*` matches `zio-json`, `zio-test`, ...
   */
  filterByPattern(declarations: Declaration[], pattern: string): Declaration[] {
    const regex = patternToRegex(pattern);
    const qualified = pattern.includes(':');

    return declarations.filter((decl) => {
      const { group, artifact } = decl.coordinate;
      return regex.test(qualified ? `${group}:${artifact}` : artifact);
    });
  }

  /**
   * Find the declared Scala version, if any.
   */
  findScalaVersion(declarations: Declaration[]): string | undefined {
    return declarations.find((decl) =>
      decl.coordinate.group === SCALA_GROUP &&
      (decl.coordinate.artifact === 'scala-library' ||
        decl.coordinate.artifact === 'scala3-library_3')
    )?.version;
  }

  /**
   * Match `"g" %[%[%]] "a" % version [% scope]` starting at `index`.
   */
  protected matchDependency(
    content: string,
    tokens: Token[],
    index: number,
    variables: Map<string, VersionVariable>,
  ): { declaration: Declaration; next: number } | undefined {
    const group = tokens[index];
    const separator = tokens[index + 1];
    const artifact = tokens[index + 2];
    const percent = tokens[index + 3];

    if (!this.isPlainString(group) || !this.isPlainString(artifact)) return undefined;
    if (separator?.kind !== 'op' || !isCrossSeparator(separator.text)) return undefined;
    if (percent?.kind !== 'op' || percent.text !== '%') return undefined;

    const version = this.readVersion(tokens, index + 4, variables);
    if (!version) return undefined;

    let next = version.next;
    let scope: string | undefined;

    const scopeOp = tokens[next];
    const scopeToken = tokens[next + 1];
    if (
      scopeOp?.kind === 'op' &&
      scopeOp.text === '%' &&
      (scopeToken?.kind === 'ident' || this.isPlainString(scopeToken))
    ) {
      scope = scopeToken.kind === 'string' ? scopeToken.value : scopeToken.text;
      next += 2;
    }

    const coordinate = createCoordinate({
      group: group.value ?? '',
      artifact: artifact.value ?? '',
      separator: separator.text,
      target: this.isPluginCall(tokens, index) ? 'plugin' : 'library',
      scope,
    });

    return {
      declaration: this.declaration(content, coordinate, version, group.start),
      next,
    };
  }

  /**
   * Match `scalaVersion := version`.
   */
  protected matchScalaVersion(
    content: string,
    tokens: Token[],
    index: number,
    variables: Map<string, VersionVariable>,
  ): { declaration: Declaration; next: number } | undefined {
    const key = tokens[index];
    const assign = tokens[index + 1];

    if (key.kind !== 'ident' || key.text !== 'scalaVersion') return undefined;
    if (assign?.kind !== 'op' || assign.text !== ':=') return undefined;

    const version = this.readVersion(tokens, index + 2, variables);
    if (!version) return undefined;

    const artifact = version.value.startsWith('3.') ? 'scala3-library_3' : 'scala-library';
    const coordinate = createCoordinate({
      group: SCALA_GROUP,
      artifact,
      separator: '%',
      target: 'library',
    });

    return {
      declaration: this.declaration(content, coordinate, version, key.start),
      next: version.next,
    };
  }

  /**
   * Read a version at `index`: a plain string literal, or an identifier
   * (optionally qualified, `Versions.cats`) naming a version variable.
   */
  protected readVersion(
    tokens: Token[],
    index: number,
    variables: Map<string, VersionVariable>,
  ): ResolvedVersion | undefined {
    const token = tokens[index];

    if (this.isPlainString(token) && token.valueSpan && token.value !== undefined) {
      if (this.continuesExpression(tokens[index + 1], token)) return undefined;
      return {
        value: token.value,
        span: token.valueSpan,
        source: 'literal',
        next: index + 1,
      };
    }

    if (token?.kind !== 'ident') return undefined;

    // Follow `A.B.name` to its last segment.
    let last = index;
    while (
      tokens[last + 1]?.kind === 'punct' &&
      tokens[last + 1].text === '.' &&
      tokens[last + 2]?.kind === 'ident'
    ) {
      last += 2;
    }

    const variable = variables.get(tokens[last].text);
    if (!variable) return undefined;

    return {
      value: variable.value,
      span: variable.span,
      source: 'variable',
      variable: tokens
        .slice(index, last + 1)
        .map((t) => t.text)
        .join(''),
      next: last + 1,
    };
  }

  protected declaration(
    content: string,
    coordinate: Coordinate,
    version: ResolvedVersion,
    offset: number,
  ): Declaration {
    const { line, column } = positionAt(content, offset);

    return {
      coordinate,
      version: version.value,
      source: version.source,
      variable: version.variable,
      span: version.span,
      offset,
      line,
      column,
    };
  }

  /**
   * Whether `tokens[index]` sits inside `addSbtPlugin(...)`.
   */
  protected isPluginCall(tokens: Token[], index: number): boolean {
    const paren = tokens[index - 1];
    const callee = tokens[index - 2];

    return paren?.text === '(' && callee?.kind === 'ident' && callee.text === 'addSbtPlugin';
  }

  protected isPlainString(token: Token | undefined): token is Token {
    return token?.kind === 'string' && !token.interpolated;
  }

  /**
   * Whether a literal is only the start of a larger expression
   * (`"1." + minor`, `"1.0".trim`), which makes it unusable as a version.
   */
  protected continuesExpression(next: Token | undefined, literal: Token): boolean {
    if (!next) return false;
    if (next.kind === 'punct' && next.text === '.') return next.start === literal.end;
    return next.kind === 'op' && (next.text === '+' || next.text === '++');
  }
}

interface ResolvedVersion {
  value: string;
  span: Span;
  source: 'literal' | 'variable';
  variable?: string;
  next: number;
}

function isCrossSeparator(text: string): text is CrossSeparator {
  return text === '%' || text === '%%' || text === '%%%';
}

/**
 * Convert a `*` wildcard pattern to an anchored regex.
 */
export function patternToRegex(pattern: string): RegExp {
  const regexPattern = pattern
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&') // Escape special chars
    .replace(/\\\*/g, '.*'); // Convert escaped * back to .*

  return new RegExp(`^${regexPattern}$`);
}

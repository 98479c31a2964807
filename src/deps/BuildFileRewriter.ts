/**
 * Applies selected upgrades back into build text.
 *
 * Only the characters inside each selected version span change. Every
 * edit is validated before output is built, so a failed rewrite never
 * produces partially edited text.
 *
 * @module
 */

import { coordinateKey, type Span } from './Coordinate.ts';
import type { Declaration } from './BuildFileParser.ts';
import type { UpdateCandidate } from './UpdateClassifier.ts';
import { VersionComparator } from './VersionComparator.ts';

/**
 * Replace the text in `span` with `text`.
 */
export interface Edit {
  readonly span: Span;
  readonly text: string;
}

/** Edits sorted by start offset, non-overlapping once validated. */
export type EditPlan = readonly Edit[];

export type RewriteErrorKind = 'SpanConflict' | 'OutOfRange';

export class RewriteError extends Error {
  override readonly name = 'RewriteError';
  readonly kind: RewriteErrorKind;
  readonly span: Span;

  constructor(kind: RewriteErrorKind, span: Span, message: string) {
    super(message);
    this.kind = kind;
    this.span = span;
  }
}

/**
 * Turns a selection into an edit plan and splices it into text.
 *
 * @example
 * ```typescript
 * const rewriter = new BuildFileRewriter();
 * const updated = rewriter.rewrite(text, parser.parse(text), selection);
 * ```
 */
export class BuildFileRewriter {
  constructor(protected comparator = new VersionComparator()) {}

  /**
   * Plan, validate and apply in one step.
   *
   * @throws RewriteError on overlapping or out-of-range spans
   */
  rewrite(
    text: string,
    declarations: readonly Declaration[],
    selection: readonly UpdateCandidate[],
  ): string {
    return this.apply(text, this.plan(declarations, selection));
  }

  /**
   * Edits for every declaration of a selected coordinate that is older
   * than the proposed version. A declaration already at or past it is
   * left alone, so nothing is ever downgraded.
   *
   * Declarations sharing one `val` produce identical edits, which collapse
   * into one. Two different replacements for the same span are a conflict.
   *
   * @throws RewriteError with kind `SpanConflict`
   */
  plan(
    declarations: readonly Declaration[],
    selection: readonly UpdateCandidate[],
  ): EditPlan {
    const proposed = new Map<string, string>();
    for (const candidate of selection) {
      proposed.set(coordinateKey(candidate.coordinate), candidate.proposed);
    }

    const edits = new Map<string, Edit>();

    for (const decl of declarations) {
      const text = proposed.get(coordinateKey(decl.coordinate));
      if (text === undefined || !this.comparator.isNewer(decl.version, text)) continue;

      const key = `${decl.span.start}:${decl.span.end}`;
      const existing = edits.get(key);

      if (existing && existing.text !== text) {
        throw new RewriteError(
          'SpanConflict',
          decl.span,
          `Conflicting edits for ${describeSpan(decl.span)}: "${existing.text}" and "${text}"` +
            (decl.variable ? ` (shared by ${decl.variable})` : ''),
        );
      }

      edits.set(key, Object.freeze({ span: decl.span, text }));
    }

    return Object.freeze(sortEdits([...edits.values()]));
  }

  /**
   * Splice `plan` into `text` in a single left-to-right pass.
   *
   * @throws RewriteError when a span is outside the text or two spans overlap
   */
  apply(text: string, plan: EditPlan): string {
    const edits = sortEdits([...plan]);

    for (const edit of edits) {
      const { start, end } = edit.span;
      if (
        !Number.isInteger(start) ||
        !Number.isInteger(end) ||
        start < 0 ||
        start > end ||
        end > text.length
      ) {
        throw new RewriteError(
          'OutOfRange',
          edit.span,
          `${describeSpan(edit.span)} is outside the text (length ${text.length})`,
        );
      }
    }

    for (let i = 1; i < edits.length; i++) {
      const previous = edits[i - 1];
      const current = edits[i];

      if (overlaps(previous.span, current.span)) {
        throw new RewriteError(
          'SpanConflict',
          current.span,
          `${describeSpan(current.span)} overlaps ${describeSpan(previous.span)}`,
        );
      }
    }

    let output = '';
    let cursor = 0;

    for (const edit of edits) {
      output += text.slice(cursor, edit.span.start) + edit.text;
      cursor = edit.span.end;
    }

    return output + text.slice(cursor);
  }
}

function sortEdits(edits: Edit[]): Edit[] {
  return edits.sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
}

/**
 * Whether two sorted spans share a character, or sit at the same
 * insertion point.
 */
function overlaps(a: Span, b: Span): boolean {
  if (a.start === b.start) return true;
  return b.start < a.end;
}

function describeSpan(span: Span): string {
  return `span [${span.start}, ${span.end})`;
}

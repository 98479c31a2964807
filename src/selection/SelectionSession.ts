/**
 * Cursor and selection state behind the interactive upgrade picker.
 *
 * The session is pure state: the terminal prompt translates keypresses
 * into calls on it and renders from its getters.
 *
 * @module
 */

import { retargetCandidate, type UpdateCandidate } from '../deps/UpdateClassifier.ts';

/**
 * Selection state over an ordered list of candidates.
 *
 * @example
 * ```typescript
 * const session = new SelectionSession(candidates);
 * session.MoveDown();
 * session.Toggle();
 * const selected = session.Submit();
 * ```
 */
export class SelectionSession {
  protected candidates: UpdateCandidate[];
  protected selected: boolean[];
  protected cursor = 0;

  public constructor(candidates: readonly UpdateCandidate[]) {
    this.candidates = [...candidates];
    this.selected = candidates.map(() => false);
  }

  /** Candidates in display order, with any re-targeted versions applied. */
  public get Candidates(): readonly UpdateCandidate[] {
    return this.candidates;
  }

  public get Cursor(): number {
    return this.cursor;
  }

  public get SelectedCount(): number {
    return this.selected.filter(Boolean).length;
  }

  public get IsEmpty(): boolean {
    return this.candidates.length === 0;
  }

  public IsSelected(index: number): boolean {
    return this.selected[index] ?? false;
  }

  public MoveUp(): void {
    if (this.IsEmpty) return;
    this.cursor = (this.cursor - 1 + this.candidates.length) % this.candidates.length;
  }

  public MoveDown(): void {
    if (this.IsEmpty) return;
    this.cursor = (this.cursor + 1) % this.candidates.length;
  }

  /**
   * Move the cursor to `index`, clamped to the list.
   */
  public MoveTo(index: number): void {
    if (this.IsEmpty) return;
    this.cursor = Math.min(Math.max(0, Math.trunc(index)), this.candidates.length - 1);
  }

  /**
   * Flip the row under the cursor.
   */
  public Toggle(): void {
    if (this.IsEmpty) return;
    this.selected[this.cursor] = !this.selected[this.cursor];
  }

  /**
   * Select every row, or clear them all when every row is already selected.
   */
  public ToggleAll(): void {
    const all = this.selected.every(Boolean);
    this.selected = this.selected.map(() => !all);
  }

  /**
   * Propose the next alternative version for the row under the cursor.
   */
  public NextTarget(): void {
    this.cycleTarget(1);
  }

  /**
   * Propose the previous alternative version for the row under the cursor.
   */
  public PreviousTarget(): void {
    this.cycleTarget(-1);
  }

  /**
   * Selected candidates in list order.
   */
  public Submit(): UpdateCandidate[] {
    return this.candidates.filter((_, i) => this.selected[i]);
  }

  protected cycleTarget(step: 1 | -1): void {
    const candidate = this.candidates[this.cursor];
    if (!candidate || candidate.alternatives.length < 2) return;

    const { alternatives } = candidate;
    const current = alternatives.findIndex((alt) => alt.version === candidate.proposed);
    const next = (current + step + alternatives.length) % alternatives.length;

    this.candidates[this.cursor] = retargetCandidate(candidate, alternatives[next].version);
  }
}

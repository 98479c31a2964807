/**
 * Terminal picker for upgrade candidates.
 *
 * Keys:
 *
 * - `↑`/`↓` (or `k`/`j`) move the cursor, wrapping at either end
 * - `home`/`end` jump to the first or last row
 * - `space` toggles the row, `a` toggles every row
 * - `←`/`→` cycle the row's proposed version through its alternatives
 * - `enter` submits, `q` quits without selecting
 *
 * All state lives in a {@link SelectionSession}; this module only maps
 * keypresses onto it and renders it.
 *
 * @module
 */

import {
  createPrompt,
  isDownKey,
  isEnterKey,
  isSpaceKey,
  isUpKey,
  type KeypressEvent,
  makeTheme,
  useKeypress,
  usePrefix,
  useState,
} from '@inquirer/core';
import chalk from 'chalk';
import { formatCoordinate } from '../deps/Coordinate.ts';
import type { UpdateCandidate } from '../deps/UpdateClassifier.ts';
import type { UpdateRank } from '../deps/VersionComparator.ts';
import type { SelectionSession } from '../selection/SelectionSession.ts';

export interface UpgradeSelectConfig {
  message: string;
  session: SelectionSession;
}

/** Submitted candidates, or undefined when the user quit. */
export type UpgradeSelectResult = UpdateCandidate[] | undefined;

const RANK_COLORS: Record<UpdateRank, (text: string) => string> = {
  Major: chalk.red,
  Minor: chalk.yellow,
  Patch: chalk.green,
  Unknown: chalk.gray,
};

export const upgradeSelectPrompt = createPrompt<UpgradeSelectResult, UpgradeSelectConfig>(
  (config, done) => {
    const { session } = config;
    const theme = makeTheme();
    const [status, setStatus] = useState<'idle' | 'done'>('idle');
    const [revision, setRevision] = useState(0);
    const prefix = usePrefix({ status, theme });

    useKeypress((key) => {
      if (isEnterKey(key)) {
        setStatus('done');
        done(session.Submit());
        return;
      }

      if (key.name === 'q' || key.name === 'escape') {
        setStatus('done');
        done(undefined);
        return;
      }

      if (applyKey(session, key)) setRevision(revision + 1);
    });

    const message = theme.style.message(config.message, status);

    if (status === 'done') {
      return `${prefix} ${message} ${chalk.cyan(`${session.SelectedCount} selected`)}`;
    }

    const help = chalk.dim('(↑↓ move, space toggle, a all, ←→ version, enter apply, q/esc quit)');
    const lines = renderRows(session);

    return `${prefix} ${message} ${help}\n${lines.join('\n')}`;
  },
);

/**
 * Apply a navigation or selection key to the session.
 *
 * @returns Whether the key changed anything worth re-rendering
 */
export function applyKey(session: SelectionSession, key: KeypressEvent): boolean {
  if (isUpKey(key) || key.name === 'k') session.MoveUp();
  else if (isDownKey(key) || key.name === 'j') session.MoveDown();
  else if (key.name === 'home') session.MoveTo(0);
  else if (key.name === 'end') session.MoveTo(session.Candidates.length - 1);
  else if (isSpaceKey(key)) session.Toggle();
  else if (key.name === 'a') session.ToggleAll();
  else if (key.name === 'right') session.NextTarget();
  else if (key.name === 'left') session.PreviousTarget();
  else return false;

  return true;
}

/**
 * One line per candidate: cursor, checkbox, coordinate, versions, rank.
 */
export function renderRows(session: SelectionSession): string[] {
  const names = session.Candidates.map((c) => formatCoordinate(c.coordinate));
  const nameWidth = Math.max(0, ...names.map((n) => n.length));
  const currentWidth = Math.max(0, ...session.Candidates.map((c) => c.current.length));

  return session.Candidates.map((candidate, index) => {
    const pointer = index === session.Cursor ? chalk.cyan('❯') : ' ';
    const box = session.IsSelected(index) ? chalk.green('◉') : '◯';
    const choices = candidate.alternatives.length > 1 ? chalk.dim(` (${candidate.alternatives.length} options)`) : '';

    return `${pointer} ${box} ${names[index].padEnd(nameWidth)}  ${
      candidate.current.padEnd(currentWidth)
    } → ${candidate.proposed}  ${RANK_COLORS[candidate.rank](candidate.rank)}${choices}`;
  });
}

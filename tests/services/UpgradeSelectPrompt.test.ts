import chalk from 'chalk';
import { expect, test } from 'vitest';
import { UpdateClassifier } from '../../src/deps/UpdateClassifier.ts';
import { SelectionSession } from '../../src/selection/SelectionSession.ts';
import { applyKey, renderRows } from '../../src/services/UpgradeSelectPrompt.ts';
import { library } from '../_mocks.ts';

chalk.level = 0;

const classifier = new UpdateClassifier();

function session(): SelectionSession {
  const a = classifier.classify('1.2.0', {
    coordinate: library('org.example', 'a'),
    versions: ['1.2.1', '1.3.0', '2.0.0'],
  });
  const bb = classifier.classify('1.0.0', {
    coordinate: library('org.example', 'bb'),
    versions: ['1.0.1'],
  });
  if (!a || !bb) throw new Error('expected candidates');

  return new SelectionSession([a, bb]);
}

// =============================================================================
// renderRows() Tests
// =============================================================================

test('renderRows - Aligns names and current versions', () => {
  expect(renderRows(session())).toEqual([
    '❯ ◯ ' + 'org.example %% a ' + '  1.2.0 → 2.0.0  Major (3 options)',
    '  ◯ ' + 'org.example %% bb' + '  1.0.0 → 1.0.1  Patch',
  ]);
});

test('renderRows - Marks the cursor and selected rows', () => {
  const s = session();
  s.MoveDown();
  s.Toggle();

  const [first, second] = renderRows(s);

  expect(first.startsWith('  ◯ ')).toBe(true);
  expect(second.startsWith('❯ ◉ ')).toBe(true);
});

test('renderRows - Shows the re-targeted version', () => {
  const s = session();
  s.NextTarget();

  expect(renderRows(s)[0]).toBe('❯ ◯ org.example %% a   1.2.0 → 1.3.0  Minor (3 options)');
});

// =============================================================================
// applyKey() Tests
// =============================================================================

test('applyKey - Home and End jump to either end', () => {
  const s = session();

  expect(applyKey(s, { name: 'end', ctrl: false })).toBe(true);
  expect(s.Cursor).toBe(1);

  expect(applyKey(s, { name: 'home', ctrl: false })).toBe(true);
  expect(s.Cursor).toBe(0);
});

test('applyKey - Space toggles and j moves down', () => {
  const s = session();

  applyKey(s, { name: 'j', ctrl: false });
  applyKey(s, { name: 'space', ctrl: false });

  expect(s.Cursor).toBe(1);
  expect(s.IsSelected(1)).toBe(true);
});

test('applyKey - Unmapped keys change nothing', () => {
  const s = session();

  expect(applyKey(s, { name: 'x', ctrl: false })).toBe(false);
  expect(s.Cursor).toBe(0);
  expect(s.SelectedCount).toBe(0);
});

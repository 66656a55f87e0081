import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  SelectionModel,
  StatusLog,
  compileMask,
  type MachineState,
  type MigrationPolicy
} from '@tierdeck/core';

import {
  bucketsPanel,
  confirmationOverlay,
  formatSize,
  logOverlay,
  maskPanel,
  objectDetailPanel,
  objectsPanel,
  policiesPanel,
  renderScreen,
  type ScreenSource
} from '../src/terminal/render';

function populatedSelection(): SelectionModel {
  const selection = new SelectionModel();
  selection.setBuckets([{ name: 'archive', region: 'eu-west-1' }, { name: 'media' }]);
  selection.setObjects('archive', [
    { key: 'logs/a.log', size: 1536, storageTier: 'STANDARD' },
    { key: 'photos/b.jpg', size: 5 * 1024 * 1024, storageTier: 'GLACIER', lastModified: '2024-03-01T12:00:00.000Z' }
  ]);
  return selection;
}

function applyLogsMask(selection: SelectionModel): void {
  const compiled = compileMask({ name: 'Logs', pattern: 'logs/', kind: 'prefix', caseSensitive: false });
  if (!compiled.ok) {
    throw compiled.error;
  }
  selection.applyMask(compiled.mask);
}

const policy: MigrationPolicy = {
  id: '00000000-0000-4000-8000-000000000001',
  bucket: 'archive',
  mask: { name: 'Logs', pattern: 'logs/', kind: 'prefix', caseSensitive: false },
  targetTier: 'GLACIER',
  scheduled: false,
  schedule: null,
  createdAt: '2024-05-01T10:00:00.000Z'
};

test('sizes use binary units above one kilobyte', () => {
  assert.equal(formatSize(0), '0 B');
  assert.equal(formatSize(1024), '1024 B');
  assert.equal(formatSize(1536), '1.50 KB');
  assert.equal(formatSize(5 * 1024 * 1024), '5.00 MB');
  assert.equal(formatSize(3 * 1024 * 1024 * 1024), '3.00 GB');
});

test('bucket and object lists mark the selected row', () => {
  const selection = populatedSelection();
  selection.move('objects', 1);

  assert.deepEqual(bucketsPanel(selection), {
    title: 'Buckets (2) - Enter to load objects',
    lines: ['> archive eu-west-1', '  media region unresolved']
  });
  assert.deepEqual(objectsPanel(selection), {
    title: 'Objects',
    lines: ['  logs/a.log 1.50 KB Standard', '> photos/b.jpg 5.00 MB Glacier Flexible Retrieval']
  });
  assert.deepEqual(objectDetailPanel(selection).lines, [
    'Key: photos/b.jpg',
    'Size: 5.00 MB',
    'Storage: Glacier Flexible Retrieval',
    'Last modified: 2024-03-01T12:00:00.000Z',
    'Restore: n/a'
  ]);
});

test('an active mask shows in the object title and mask panel', () => {
  const selection = populatedSelection();
  assert.deepEqual(maskPanel(selection).lines, ["No active mask. Press 'm' to edit."]);

  applyLogsMask(selection);
  assert.equal(objectsPanel(selection).title, 'Objects - mask: Logs [prefix: logs/]');
  assert.deepEqual(maskPanel(selection).lines, ['Active: Logs [prefix: logs/]', '1 objects currently targeted']);
});

test('policies list their mask, tier and bucket', () => {
  assert.deepEqual(policiesPanel([policy]).lines, ['Logs -> Glacier Flexible Retrieval (archive)']);
  assert.deepEqual(policiesPanel([]).lines, ['No saved policies']);
});

test('the log overlay numbers messages newest first', () => {
  const status = new StatusLog();
  assert.deepEqual(logOverlay(status).lines, ['No status messages yet.']);

  status.push('Loading buckets…');
  status.push('Loaded objects for bucket archive');
  assert.deepEqual(logOverlay(status).lines, [' 1. Loaded objects for bucket archive', ' 2. Loading buckets…']);
});

test('confirmation overlays describe the pending action', () => {
  const selection = populatedSelection();
  applyLogsMask(selection);

  assert.deepEqual(
    confirmationOverlay({ type: 'transition', targetTier: 'DEEP_ARCHIVE', restoreFirst: true }, selection).lines,
    [
      'Confirm operation (Enter/y to proceed, Esc/n to cancel, o toggle restore-first)',
      'Transition 1 object(s) to Glacier Deep Archive',
      'Restore before transition: yes'
    ]
  );
  assert.deepEqual(confirmationOverlay({ type: 'savePolicy', targetTier: 'GLACIER_IR' }, selection).lines.slice(1), [
    'Save policy with current mask',
    'Bucket: archive',
    'Target storage class: Glacier Instant Retrieval'
  ]);
});

test('the full screen fills the terminal exactly', () => {
  const status = new StatusLog();
  status.push('Loaded objects for bucket archive');
  const state: MachineState = { mode: { kind: 'browsing' }, pane: 'buckets' };
  const source: ScreenSource = { selection: populatedSelection(), status, state, policies: [policy] };

  const lines = renderScreen(source, { columns: 200, rows: 30 });
  assert.equal(lines.length, 30);
  for (const line of lines) {
    assert.equal(Array.from(line).length, 200);
  }
  assert.ok(lines[0]?.startsWith('[Buckets (2) - Enter to load objects]'));
  assert.ok(lines[1]?.startsWith('> archive eu-west-1'));
  assert.ok(lines.some((line) => line.startsWith('Loaded objects for bucket archive')));
});

test('overlays replace the columns', () => {
  const state: MachineState = { mode: { kind: 'showingHelp' }, pane: 'objects' };
  const source: ScreenSource = { selection: new SelectionModel(), status: new StatusLog(), state, policies: [] };

  const lines = renderScreen(source, { columns: 100, rows: 24 });
  assert.equal(lines.length, 24);
  assert.ok(lines[0]?.startsWith('┌─ Cheat sheet - Esc/?/Enter to close ─'));
  assert.ok(lines[1]?.startsWith('│ Navigation: Tab/Shift+Tab switch panes'));
});

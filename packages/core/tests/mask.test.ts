import assert from 'node:assert/strict';
import { test } from 'node:test';

import { compileMask, nextMaskKind, type Mask, type MaskDefinition } from '../src/mask';

function mustCompile(definition: MaskDefinition): Mask {
  const result = compileMask(definition);
  if (!result.ok) {
    throw result.error;
  }
  return result.mask;
}

test('prefix, suffix and contains masks fold case unless case-sensitive', () => {
  const prefix = mustCompile({ name: 'logs', pattern: 'Logs/', kind: 'prefix', caseSensitive: false });
  assert.equal(prefix.matches('logs/2024/app.log'), true);
  assert.equal(prefix.matches('archive/logs/app.log'), false);

  const suffix = mustCompile({ name: 'tarballs', pattern: '.TAR.GZ', kind: 'suffix', caseSensitive: false });
  assert.equal(suffix.matches('backups/db.tar.gz'), true);
  assert.equal(suffix.matches('backups/db.tar'), false);

  const contains = mustCompile({ name: 'q1', pattern: 'q1', kind: 'contains', caseSensitive: true });
  assert.equal(contains.matches('reports/2024-q1.csv'), true);
  assert.equal(contains.matches('reports/2024-Q1.csv'), false);
});

test('toggling case sensitivity flips the result only when casing differs', () => {
  const base: MaskDefinition = { name: 'm', pattern: 'Media/', kind: 'prefix', caseSensitive: false };
  const insensitive = mustCompile(base);
  const sensitive = mustCompile({ ...base, caseSensitive: true });

  assert.equal(insensitive.matches('media/clip.mp4'), true);
  assert.equal(sensitive.matches('media/clip.mp4'), false);

  assert.equal(insensitive.matches('Media/clip.mp4'), true);
  assert.equal(sensitive.matches('Media/clip.mp4'), true);
});

test('regex masks search anywhere in the key', () => {
  const mask = mustCompile({ name: 'years', pattern: '\\d{4}', kind: 'regex', caseSensitive: true });
  assert.equal(mask.matches('backup-2024.tar'), true);
  assert.equal(mask.matches('backup-latest.tar'), false);

  const folded = mustCompile({ name: 'csv', pattern: '\\.csv$', kind: 'regex', caseSensitive: false });
  assert.equal(folded.matches('EXPORT.CSV'), true);
});

test('invalid regex and empty patterns do not compile', () => {
  const invalid = compileMask({ name: 'broken', pattern: '(unclosed', kind: 'regex', caseSensitive: false });
  assert.equal(invalid.ok, false);
  if (!invalid.ok) {
    assert.match(invalid.error.message, /^Invalid regex: /);
    assert.equal(invalid.error.code, 'VALIDATION_FAILED');
  }

  const empty = compileMask({ name: 'empty', pattern: '', kind: 'contains', caseSensitive: false });
  assert.equal(empty.ok, false);
  if (!empty.ok) {
    assert.equal(empty.error.message, 'Mask pattern cannot be empty');
  }
});

test('summary names the mask, kind and pattern', () => {
  const mask = mustCompile({ name: 'Logs', pattern: 'logs/', kind: 'prefix', caseSensitive: false });
  assert.equal(mask.summary(), 'Logs [prefix: logs/]');

  const strict = mustCompile({ name: 'Raw', pattern: 'RAW', kind: 'contains', caseSensitive: true });
  assert.equal(strict.summary(), 'Raw [contains: RAW] (case-sensitive)');
});

test('mask kinds cycle in both directions', () => {
  assert.equal(nextMaskKind('prefix'), 'suffix');
  assert.equal(nextMaskKind('regex'), 'prefix');
  assert.equal(nextMaskKind('prefix', -1), 'regex');
  assert.equal(nextMaskKind('contains', -1), 'suffix');
});

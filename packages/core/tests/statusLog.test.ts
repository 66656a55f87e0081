import assert from 'node:assert/strict';
import { test } from 'node:test';

import { DEFAULT_STATUS_LIMIT, StatusLog } from '../src/statusLog';

test('status log evicts the oldest message once full', () => {
  const log = new StatusLog(3);
  for (const message of ['a', 'b', 'c', 'd', 'e']) {
    log.push(message);
  }
  assert.deepEqual(log.messages(), ['c', 'd', 'e']);
  assert.deepEqual(log.newestFirst(), ['e', 'd', 'c']);
  assert.equal(log.latest(), 'e');
  assert.equal(log.size, 3);
});

test('status log defaults to twenty entries', () => {
  const log = new StatusLog();
  assert.equal(log.limit, DEFAULT_STATUS_LIMIT);
  for (let index = 0; index < 25; index += 1) {
    log.push(`message ${index}`);
  }
  assert.equal(log.size, 20);
  assert.equal(log.messages()[0], 'message 5');
});

test('status log rejects a non-positive capacity', () => {
  assert.throws(() => new StatusLog(0), RangeError);
  assert.equal(new StatusLog(1).latest(), undefined);
});

import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';

import { BackendError } from '../src/errors';
import type { MachineEvent } from '../src/machine';
import { PolicyStore } from '../src/policyStore';
import { ConsoleSession } from '../src/session';
import type { StorageBackend } from '../src/backend';
import { InMemoryBackend, createTempDir, object } from './helpers';

async function createSession(backend: StorageBackend, options: { statusLimit?: number; restoreDays?: number } = {}) {
  const dir = await createTempDir();
  const policyStore = PolicyStore.fromFile(path.join(dir, 'policies.json'));
  await policyStore.init();
  const session = new ConsoleSession({ backend, policyStore, ...options });
  return { session, policyStore };
}

async function dispatchAll(session: ConsoleSession, events: MachineEvent[]): Promise<void> {
  for (const event of events) {
    await session.dispatch(event);
  }
}

function typed(text: string): MachineEvent {
  return { type: 'input', text };
}

test('startup loads buckets sorted by name', async () => {
  const backend = new InMemoryBackend([{ name: 'b' }, { name: 'a' }, { name: 'c' }]);
  const { session } = await createSession(backend);

  await session.start();
  assert.deepEqual(
    session.selection.buckets.map((bucket) => bucket.name),
    ['a', 'b', 'c']
  );
  assert.deepEqual(session.status.messages(), ['Loading buckets…']);
});

test('a bucket load failure is reported and the session keeps running', async () => {
  const backend = new InMemoryBackend([]);
  backend.listBuckets = async () => {
    throw new BackendError({ category: 'serviceRejected', code: 'AccessDenied', message: 'Access Denied' });
  };
  const { session } = await createSession(backend);

  await session.start();
  assert.equal(session.status.latest(), 'Failed to load buckets: AccessDenied: Access Denied');
  assert.equal(session.finished, false);
});

test('mask, transition and policy flow through dispatched events', async () => {
  const backend = new InMemoryBackend(
    [{ name: 'archive' }],
    new Map([['archive', [object('logs/a.log'), object('img/b.png'), object('logs/c.log')]]])
  );
  const { session, policyStore } = await createSession(backend);
  await session.start();

  await dispatchAll(session, [{ type: 'loadObjects' }, { type: 'openMaskEditor' }, ...Array.from('logs/', typed)]);
  await session.dispatch({ type: 'confirm' });
  assert.equal(session.status.latest(), "Mask 'Untitled mask' matched 2 objects");
  assert.equal(session.state.mode.kind, 'browsing');

  await dispatchAll(session, [
    { type: 'beginTransition' },
    { type: 'move', delta: 1 },
    { type: 'confirm' }
  ]);
  assert.equal(session.status.latest(), 'Confirm transition to Standard-IA (press Enter to confirm)');

  const result = await session.dispatch({ type: 'confirm' });
  assert.deepEqual(result.outcomes, [
    { type: 'transition', targetTier: 'STANDARD_IA', succeeded: ['logs/a.log', 'logs/c.log'], failed: [] }
  ]);
  assert.deepEqual(
    session.selection.objects.map((entry) => entry.storageTier),
    ['STANDARD', 'STANDARD_IA', 'STANDARD_IA']
  );

  await dispatchAll(session, [{ type: 'beginSavePolicy' }, { type: 'confirm' }, { type: 'confirm' }]);
  assert.equal(session.status.latest(), 'Policy saved');
  assert.equal(policyStore.size, 1);
  assert.deepEqual(
    session.policies.map((policy) => [policy.bucket, policy.mask.pattern, policy.targetTier]),
    [['archive', 'logs/', 'STANDARD']]
  );
});

test('saving a policy without a mask leaves the store unchanged', async () => {
  const backend = new InMemoryBackend([{ name: 'archive' }], new Map([['archive', [object('a.txt')]]]));
  const { session, policyStore } = await createSession(backend);
  await session.start();
  await session.dispatch({ type: 'loadObjects' });

  const result = await session.dispatch({ type: 'beginSavePolicy' });
  assert.deepEqual(result.effects, [{ type: 'status', message: 'Cannot save policy: Apply a mask before saving a policy' }]);
  assert.equal(session.state.mode.kind, 'browsing');
  assert.equal(policyStore.size, 0);
  assert.deepEqual(session.policies, []);
});

test('restore-first uses the default duration while restore actions use the configured days', async () => {
  const backend = new InMemoryBackend([{ name: 'archive' }], new Map([['archive', [object('a.txt', 'GLACIER')]]]));
  const { session } = await createSession(backend, { restoreDays: 3 });
  await session.start();
  await session.dispatch({ type: 'loadObjects' });

  await dispatchAll(session, [
    { type: 'beginTransition' },
    { type: 'confirm' },
    { type: 'toggleRestoreFirst' },
    { type: 'confirm' }
  ]);
  await dispatchAll(session, [{ type: 'beginRestore' }, { type: 'confirm' }]);

  assert.deepEqual(
    backend.calls.filter((call) => call.op === 'restore'),
    [
      { op: 'restore', bucket: 'archive', key: 'a.txt', days: 7 },
      { op: 'restore', bucket: 'archive', key: 'a.txt', days: 3 }
    ]
  );
});

test('moving to another bucket leaves nothing to transition until it is loaded', async () => {
  const backend = new InMemoryBackend(
    [{ name: 'archive' }, { name: 'media' }],
    new Map([['archive', [object('a.txt')]], ['media', [object('b.txt')]]])
  );
  const { session } = await createSession(backend);
  await session.start();
  await dispatchAll(session, [{ type: 'loadObjects' }, { type: 'move', delta: 1 }]);

  const rejected = await session.dispatch({ type: 'beginTransition' });
  assert.deepEqual(rejected.effects, [
    { type: 'status', message: 'Storage selection unavailable: Select at least one object (mask or row)' }
  ]);
  assert.equal(session.state.mode.kind, 'browsing');

  await session.dispatch({ type: 'loadObjects' });
  await dispatchAll(session, [{ type: 'beginTransition' }, { type: 'confirm' }, { type: 'confirm' }]);
  assert.deepEqual(
    backend.calls.filter((call) => call.op === 'transition'),
    [{ op: 'transition', bucket: 'media', key: 'b.txt', tier: 'STANDARD' }]
  );
});

test('effect failures become status messages', async () => {
  const backend = new InMemoryBackend([{ name: 'archive' }], new Map([['archive', [object('a.txt')]]]));
  backend.failOn('listObjects', 'archive', new BackendError({ category: 'timeout' }));
  const { session } = await createSession(backend);
  await session.start();

  await session.dispatch({ type: 'loadObjects' });
  assert.equal(session.status.latest(), 'Failed to load objects: request timed out; please retry');

  await session.dispatch({ type: 'inspectObject' });
  assert.equal(session.status.latest(), 'Inspect failed: Select an object to inspect');
});

test('quit marks the session finished', async () => {
  const { session } = await createSession(new InMemoryBackend([]));
  await session.dispatch({ type: 'openHelp' });
  await session.dispatch({ type: 'quit' });
  assert.equal(session.finished, false);

  await session.dispatch({ type: 'close' });
  await session.dispatch({ type: 'quit' });
  assert.equal(session.finished, true);
});

test('the status log honours the configured limit', async () => {
  const { session } = await createSession(new InMemoryBackend([{ name: 'archive' }]), { statusLimit: 2 });
  await session.start();
  await session.dispatch({ type: 'refreshBuckets' });
  await session.dispatch({ type: 'openMaskEditor' });
  assert.deepEqual(session.status.messages(), [
    'Refreshing buckets…',
    'Mask editor active - Tab moves between fields, arrows/space adjust options, Enter applies'
  ]);
});

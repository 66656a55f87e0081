import assert from 'node:assert/strict';
import { test } from 'node:test';
import { NoSuchKey, S3ServiceException } from '@aws-sdk/client-s3';
import { BackendError, ValidationError, describeFailure } from '@tierdeck/core';

import { toBackendError, withBackendErrors } from '../src/lib/s3Errors';

function classificationOf(error: unknown) {
  const mapped = toBackendError(error);
  assert.ok(mapped instanceof BackendError);
  return mapped.classification;
}

test('service exceptions keep their code and message', () => {
  const classification = classificationOf(new NoSuchKey({ $metadata: {}, message: 'The specified key does not exist.' }));
  assert.deepEqual(classification, {
    category: 'serviceRejected',
    code: 'NoSuchKey',
    message: 'The specified key does not exist.'
  });
  assert.equal(
    describeFailure(classification),
    'NoSuchKey: object was not found (mask may target stale keys or bucket differs)'
  );

  const generic = new S3ServiceException({ name: 'AccessDenied', $fault: 'client', $metadata: {}, message: 'Access Denied' });
  assert.deepEqual(classificationOf(generic), { category: 'serviceRejected', code: 'AccessDenied', message: 'Access Denied' });
});

test('timeouts and connection failures are transport failures', () => {
  const timeout = new Error('socket timed out');
  timeout.name = 'TimeoutError';
  assert.deepEqual(classificationOf(timeout), { category: 'timeout' });

  const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9000'), { code: 'ECONNREFUSED' });
  assert.deepEqual(classificationOf(refused), {
    category: 'dispatchFailure',
    detail: 'connect ECONNREFUSED 127.0.0.1:9000'
  });
});

test('unparseable responses and other failures are classified', () => {
  assert.deepEqual(classificationOf(new SyntaxError('Unexpected token < in JSON')), {
    category: 'responseMalformed',
    detail: 'Unexpected token < in JSON'
  });
  assert.deepEqual(classificationOf(new Error('something odd')), { category: 'unknown', raw: 'something odd' });
  assert.deepEqual(classificationOf(42), { category: 'unknown', raw: '42' });
});

test('already classified errors pass through', async () => {
  const validation = new ValidationError('Select a bucket first');
  assert.equal(toBackendError(validation), validation);

  await assert.rejects(
    withBackendErrors(async () => {
      throw Object.assign(new Error('getaddrinfo ENOTFOUND s3.invalid'), { code: 'ENOTFOUND' });
    }),
    (error: unknown) =>
      error instanceof BackendError && error.message === 'network/dispatch failure: getaddrinfo ENOTFOUND s3.invalid'
  );
});

/**
 * @description: Validates log sanitising and error rendering helpers.
 * @scope: test
 * @module: LoggerTests
 */
import test from 'node:test';
import { strict as assert } from 'node:assert';

import { REDACTED, describeError, sanitizeLogData } from '../src/logger.js';

test('sanitizeLogData redacts secret-looking keys at any depth', () => {
  const input = {
    token: 'test-token',
    clientId: '123',
    nested: { apiKey: 'test-secret', prefix: '!' },
    list: [{ password: 'hunter2' }]
  };

  assert.deepEqual(sanitizeLogData(input), {
    token: REDACTED,
    clientId: '123',
    nested: { apiKey: REDACTED, prefix: '!' },
    list: [{ password: REDACTED }]
  });
  // The input object is left untouched.
  assert.equal(input.token, 'test-token');
});

test('sanitizeLogData keeps empty secrets visible so missing configuration stays obvious', () => {
  assert.deepEqual(sanitizeLogData({ token: '', secret: undefined }), { token: '', secret: undefined });
});

test('sanitizeLogData passes primitives through', () => {
  assert.equal(sanitizeLogData('plain'), 'plain');
  assert.equal(sanitizeLogData(42), 42);
  assert.equal(sanitizeLogData(null), null);
});

test('describeError follows cause chains', () => {
  const error = new Error('outer', { cause: new TypeError('inner') });
  assert.equal(describeError(error), 'Error: outer (caused by TypeError: inner)');
  assert.equal(describeError('boom'), 'boom');
});

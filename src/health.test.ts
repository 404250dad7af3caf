import assert from 'node:assert/strict';
import test from 'node:test';

import { checkHealth } from './health';

test('checkHealth always reports ok', () => {
  for (let i = 0; i < 5; i += 1) {
    assert.deepEqual(checkHealth(), { status: 'ok' });
  }
});

test('checkHealth returns a fresh value each call', () => {
  const first = checkHealth();
  assert.notEqual(first, checkHealth());
});

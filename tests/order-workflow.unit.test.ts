import assert from 'node:assert/strict';
import test from 'node:test';
import { InvalidTransitionError } from '../lib/errors';
import { assertTransition, canTransition, nextStatuses } from '../lib/order-workflow';

test('pending orders can be completed or returned', () => {
  assert.deepEqual(nextStatuses('pending'), ['completed', 'returned']);
  assert.equal(canTransition('pending', 'completed'), true);
  assert.equal(canTransition('completed', 'returned'), true);
});

test('nothing leaves the returned state', () => {
  assert.deepEqual(nextStatuses('returned'), []);
  assert.deepEqual(nextStatuses('completed'), ['returned']);
  assert.throws(() => assertTransition('returned', 'completed'), InvalidTransitionError);
  assert.throws(() => assertTransition('completed', 'pending'), {
    message: 'Order cannot move from completed to pending.',
  });
});


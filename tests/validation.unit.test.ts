import assert from 'node:assert/strict';
import test from 'node:test';
import { ValidationError } from '../lib/errors';
import {
  creditInputSchema,
  isIsoDate,
  orderInputSchema,
  parseInput,
  productInputSchema,
  stockScanSchema,
  validate,
} from '../lib/validation';

test('isIsoDate rejects impossible calendar days', () => {
  assert.equal(isIsoDate('2026-02-28'), true);
  assert.equal(isIsoDate('2026-02-29'), false);
  assert.equal(isIsoDate('2026-3-1'), false);
});

test('validate reports every failing field with its path', () => {
  const result = validate(productInputSchema, { name: '', selling_price: 'abc', tax_rate_percent: 120 });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.deepEqual(result.fieldErrors, [
    { field: 'name', message: 'name is required' },
    { field: 'selling_price', message: 'selling_price must be a number' },
    { field: 'tax_rate_percent', message: 'tax_rate_percent must be between 0 and 100' },
  ]);
});

test('parseInput throws a ValidationError carrying the field errors', () => {
  assert.throws(
    () => parseInput(orderInputSchema, { lines: [{ product_id: 1, quantity: 0 }], payment_method: 'cash' }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.deepEqual(error.fieldErrors, [{ field: 'lines.0.quantity', message: 'quantity must be greater than zero' }]);
      return true;
    }
  );
});

test('form checkboxes and blank numbers map to booleans and defaults', () => {
  const order = parseInput(orderInputSchema, {
    lines: [{ product_id: '3', quantity: '2' }],
    payment_method: 'UPI',
    customer_name: '  ',
    complete: 'on',
  });

  assert.deepEqual(order, {
    lines: [{ product_id: 3, quantity: 2 }],
    payment_method: 'upi',
    customer_name: null,
    customer_phone: null,
    complete: true,
  });
});

test('credit input defaults quantity to one and leaves amount open', () => {
  const credit = parseInput(creditInputSchema, { customer_name: 'Asha', item_name: 'Tea', amount: '' });

  assert.equal(credit.quantity, 1);
  assert.equal(credit.amount, undefined);
  assert.equal(credit.customer_phone, '');
});

test('stock scans add at least one unit', () => {
  assert.equal(parseInput(stockScanSchema, { code: '8901', delta: '-4' }).delta, 1);
  assert.equal(parseInput(stockScanSchema, { code: '8901', delta: '6' }).delta, 6);
});

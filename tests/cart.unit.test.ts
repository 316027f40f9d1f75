import assert from 'node:assert/strict';
import test from 'node:test';
import { addItemToCart, cartTotal, removeItemFromCart } from '../lib/cart';

const rice = { id: 10, name: 'Rice 1kg', selling_price: 60, discount: 5, stock_quantity: 5 };

test('addItemToCart adds a new product with quantity 1 at the discounted price', () => {
  const result = addItemToCart([], rice);

  assert.equal(result.message, null);
  assert.equal(result.nextLines.length, 1);
  assert.equal(result.nextLines[0].productId, 10);
  assert.equal(result.nextLines[0].quantity, 1);
  assert.equal(result.nextLines[0].unitPrice, 55);
});

test('addItemToCart blocks out-of-stock product', () => {
  const initial = [{ productId: 10, name: 'Rice 1kg', unitPrice: 55, quantity: 1 }];
  const result = addItemToCart(initial, { id: 11, name: 'Sugar 1kg', selling_price: 45, discount: 0, stock_quantity: 0 });

  assert.equal(result.nextLines, initial);
  assert.equal(result.message, 'Sugar 1kg is out of stock.');
});

test('addItemToCart blocks quantity above stock', () => {
  const initial = [{ productId: 10, name: 'Rice 1kg', unitPrice: 55, quantity: 2 }];
  const result = addItemToCart(initial, { ...rice, stock_quantity: 2 });

  assert.equal(result.nextLines, initial);
  assert.equal(result.message, 'Only 2 Rice 1kg available.');
});

test('addItemToCart increments quantity when stock allows', () => {
  const initial = [{ productId: 10, name: 'Rice 1kg', unitPrice: 55, quantity: 1 }];
  const result = addItemToCart(initial, { ...rice, stock_quantity: 3 });

  assert.equal(result.message, null);
  assert.equal(result.nextLines[0].quantity, 2);
});

test('removeItemFromCart drops a line when its quantity reaches zero', () => {
  const lines = [
    { productId: 10, name: 'Rice 1kg', unitPrice: 55, quantity: 1 },
    { productId: 11, name: 'Sugar 1kg', unitPrice: 45, quantity: 2 },
  ];

  const next = removeItemFromCart(lines, 10);

  assert.deepEqual(next, [{ productId: 11, name: 'Sugar 1kg', unitPrice: 45, quantity: 2 }]);
});

test('cartTotal sums unit price times quantity', () => {
  assert.equal(
    cartTotal([
      { productId: 10, name: 'Rice 1kg', unitPrice: 55.5, quantity: 2 },
      { productId: 11, name: 'Sugar 1kg', unitPrice: 45.25, quantity: 1 },
    ]),
    156.25
  );
});

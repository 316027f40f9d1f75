import assert from 'node:assert/strict';
import test from 'node:test';
import { buildShareText, generateReceipt } from '../lib/receipt';
import type { OrderWithLines } from '../lib/shop-types';

const order: OrderWithLines = {
  id: 42,
  status: 'completed',
  payment_method: 'upi',
  total_amount: 230,
  customer_name: 'Asha',
  customer_phone: null,
  return_reason: null,
  created_by: 'staff@example.test',
  created_at: '2026-03-15T10:00:00.000Z',
  completed_at: '2026-03-15T10:00:00.000Z',
  returned_at: null,
  lines: [
    {
      id: 1,
      order_id: 42,
      product_id: 1,
      product_name: 'Rice 1kg',
      quantity: 2,
      unit_price: 55,
      unit_cost: 40,
      tax_rate_percent: 5,
      subtotal: 110,
    },
    {
      id: 2,
      order_id: 42,
      product_id: 2,
      product_name: 'Toor Dal 1kg',
      quantity: 1,
      unit_price: 120,
      unit_cost: 100,
      tax_rate_percent: 0,
      subtotal: 120,
    },
  ],
};

test('buildShareText lists each line and the payment method', () => {
  assert.equal(
    buildShareText(order),
    [
      'Order #42 - Asha',
      '2 x Rice 1kg = Rs.110.00',
      '1 x Toor Dal 1kg = Rs.120.00',
      'Total: Rs.230.00',
      'Paid by UPI',
    ].join('\n')
  );
});

test('generateReceipt prints the shop name, lines and total', () => {
  const receipt = generateReceipt(order, 'Test Kirana');
  const lines = receipt.split('\n').map((text) => text.trim());

  assert.ok(lines.includes('TEST KIRANA'));
  assert.ok(lines.includes('Order ID: 42'));
  assert.ok(lines.includes('Customer: Asha'));
  assert.ok(lines.includes('Rice 1kg x2 @ Rs.55.00 - Rs.110.00'));
  assert.ok(lines.includes('TOTAL:                 Rs.230.00'));
  assert.ok(lines.includes('PAYMENT:               UPI'));
});
